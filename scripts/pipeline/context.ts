import { resolve } from "node:path";
import type { BuildConfig } from "../config/build-config.js";
import type { Verbosity } from "../config/verbosity.js";
import type { AzurePipelines } from "../utils/azure-pipelines.js";
import type { CommandRunner } from "../utils/process.js";

/**
 * Everything a stage needs besides its own inputs
 */
export interface StageContext {
  /** Repository root; relative config paths resolve against it */
  rootDir: string;
  config: BuildConfig;
  verbosity: Verbosity;
  runner: CommandRunner;
  ci: AzurePipelines;
}

export function artifactsRoot(ctx: StageContext): string {
  return resolve(ctx.rootDir, ctx.config.artifactsDir);
}
