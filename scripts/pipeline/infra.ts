/**
 * Infrastructure package: the resource-group deployment project and the
 * database admin tool share one output folder, with both migration script
 * folders copied alongside so a release can provision and migrate from a
 * single artifact.
 */
import { existsSync } from "node:fs";
import { cp, mkdir } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { APIM_PUBLISH_DIR, DOTNET } from "../config/pipeline-defaults.js";
import { info, success, warning } from "../utils/logger.js";
import { runStep } from "../utils/process.js";
import { archiveFolder } from "./archive.js";
import { artifactsRoot, type StageContext } from "./context.js";

export interface InfraPackage {
  outputDir: string;
  apimZip?: string;
}

export async function packageInfrastructure(ctx: StageContext, destination: string): Promise<InfraPackage> {
  const { infra, database } = ctx.config;
  const root = artifactsRoot(ctx);
  const outputDir = join(root, infra.output);
  const verbosity = ["--verbosity", ctx.verbosity];

  info(`Packaging ${infra.resourceGroupProject}`);
  await runStep(
    ctx.runner,
    {
      command: DOTNET,
      args: ["build", infra.resourceGroupProject, "--no-restore", ...verbosity, "--output", outputDir],
      cwd: ctx.rootDir,
    },
    "infra"
  );

  info(`Publishing ${infra.dbAdminTool} into the same folder`);
  await runStep(
    ctx.runner,
    {
      command: DOTNET,
      args: ["publish", infra.dbAdminTool, "--no-restore", "--no-build", ...verbosity, "--output", outputDir],
      cwd: ctx.rootDir,
    },
    "infra"
  );

  await mkdir(outputDir, { recursive: true });
  for (const scripts of [database.main.migrationsDir, database.apimConsumption.migrationsDir]) {
    const target = join(outputDir, basename(scripts));
    info(`Copying ${scripts} -> ${target}`);
    await cp(resolve(ctx.rootDir, scripts), target, { recursive: true });
  }

  const name = basename(infra.output);
  ctx.ci.uploadArtifact(name, name, outputDir);

  const apimDir = join(root, APIM_PUBLISH_DIR);
  if (!existsSync(apimDir)) {
    const message = `${apimDir} not found, no API management archive produced`;
    warning(message);
    ctx.ci.logIssue("warning", message);
    return { outputDir };
  }

  const apimZip = await archiveFolder(apimDir, destination, APIM_PUBLISH_DIR, ctx.ci);
  success("Infrastructure package ready");
  return { outputDir, apimZip };
}
