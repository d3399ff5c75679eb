/**
 * Zip archives of published folders, registered as build artifacts.
 */
import { createWriteStream, existsSync } from "node:fs";
import { mkdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import archiver from "archiver";
import type { AzurePipelines } from "../utils/azure-pipelines.js";
import { info, warning } from "../utils/logger.js";
import type { StageContext } from "./context.js";
import type { PublishedProject } from "./publish.js";

/**
 * Zip a directory's contents (not the directory itself) into a .zip file.
 * An existing file at `outZipPath` is truncated; a partly written one is
 * removed when archiving fails.
 *
 * @throws the filesystem error when `srcDir` is missing or not a directory
 */
export async function zipDirectory(srcDir: string, outZipPath: string): Promise<void> {
  if (!(await stat(srcDir)).isDirectory()) {
    throw new Error(`${srcDir} is not a directory`);
  }

  const archive = archiver("zip", { zlib: { level: 9 } });
  const stream = createWriteStream(outZipPath);
  let opened = false;
  stream.on("open", () => {
    opened = true;
  });

  try {
    await new Promise<void>((resolve, reject) => {
      stream.on("close", () => resolve());
      stream.on("error", reject);
      archive.on("error", reject);
      archive.on("warning", reject);
      archive.directory(srcDir, false).pipe(stream);
      archive.finalize().catch(reject);
    });
  } catch (err) {
    archive.abort();
    stream.destroy();
    if (opened) await rm(outZipPath, { force: true });
    throw err;
  }
}

/**
 * Compresses `folder` into `<destination>/<name>.zip` and emits the upload marker.
 * A missing destination is created and reported as a build warning.
 */
export async function archiveFolder(
  folder: string,
  destination: string,
  name: string,
  ci: AzurePipelines
): Promise<string> {
  if (!existsSync(destination)) {
    const message = `Zip destination ${destination} does not exist, creating it`;
    warning(message);
    ci.logIssue("warning", message);
    await mkdir(destination, { recursive: true });
  }

  const zipPath = join(destination, `${name}.zip`);
  info(`Archiving ${folder} -> ${zipPath}`);
  await zipDirectory(folder, zipPath);
  ci.uploadArtifact(name, name, zipPath);
  return zipPath;
}

export async function archivePublishedProjects(
  ctx: StageContext,
  published: readonly PublishedProject[],
  destination: string
): Promise<string[]> {
  const zips: string[] = [];
  for (const project of published) {
    zips.push(await archiveFolder(project.outputDir, destination, project.name, ctx.ci));
  }
  return zips;
}
