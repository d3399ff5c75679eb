/**
 * Per-project publish into the artifacts tree.
 *
 * Publishing never restores or builds: the solution stage already compiled
 * everything. The API project additionally lays out its approved OpenAPI
 * documents for API management, and that layout is moved to the artifacts root
 * so the APIM tooling always finds it at `<artifacts>/ApimPublish`.
 */
import { copyFile, mkdir, rename, rm } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { OpenApiSpec, PublishProject } from "../config/build-config.js";
import { APIM_PUBLISH_DIR, DOTNET } from "../config/pipeline-defaults.js";
import { info, success } from "../utils/logger.js";
import { runStep } from "../utils/process.js";
import { artifactsRoot, type StageContext } from "./context.js";

export interface PublishedProject {
  project: PublishProject;
  /** Artifact (and zip) name: last segment of the project path */
  name: string;
  outputDir: string;
}

export function artifactName(projectPath: string): string {
  return basename(projectPath.replace(/[\\/]+$/, ""));
}

export function publishOutputDir(root: string, projectPath: string): string {
  return join(root, projectPath);
}

/**
 * Copies approved specs to `<outputDir>/ApimPublish/apis/<name>/<name>-v1.json`.
 * Missing source files are not checked up front; the copy error surfaces as is.
 */
export async function copyApprovedSpecs(
  rootDir: string,
  openApi: OpenApiSpec,
  outputDir: string
): Promise<string> {
  const apimDir = join(outputDir, APIM_PUBLISH_DIR);
  for (const api of openApi.apis) {
    const source = resolve(rootDir, openApi.fixturesDir, `${api}.approved.json`);
    const targetDir = join(apimDir, "apis", api);
    await mkdir(targetDir, { recursive: true });
    await copyFile(source, join(targetDir, `${api}-v1.json`));
  }
  return apimDir;
}

/**
 * Moves an ApimPublish folder to the artifacts root, replacing a previous one.
 */
export async function relocateApimPublish(apimDir: string, root: string): Promise<string> {
  const target = join(root, APIM_PUBLISH_DIR);
  await rm(target, { recursive: true, force: true });
  await mkdir(root, { recursive: true });
  await rename(apimDir, target);
  return target;
}

export async function publishProject(
  ctx: StageContext,
  project: PublishProject,
  suffix: string
): Promise<PublishedProject> {
  const root = artifactsRoot(ctx);
  const outputDir = publishOutputDir(root, project.path);
  const args = ["publish", "--no-restore", "--no-build", "--verbosity", ctx.verbosity, "--output", outputDir];
  if (suffix) args.push("--version-suffix", suffix);

  info(`Publishing ${project.path} (${project.role})`);
  await runStep(ctx.runner, { command: DOTNET, args, cwd: resolve(ctx.rootDir, project.path) }, "publish");

  if (project.openApi) {
    const apimDir = await copyApprovedSpecs(ctx.rootDir, project.openApi, outputDir);
    const target = await relocateApimPublish(apimDir, root);
    info(`API management layout written to ${target}`);
  }

  return { project, name: artifactName(project.path), outputDir };
}

/**
 * Publishes every configured project in table order, stopping at the first failure.
 */
export async function publishProjects(ctx: StageContext, suffix: string): Promise<PublishedProject[]> {
  const published: PublishedProject[] = [];
  for (const project of ctx.config.publish) {
    published.push(await publishProject(ctx, project, suffix));
  }
  success(`Published ${published.length} project${published.length !== 1 ? "s" : ""}`);
  return published;
}
