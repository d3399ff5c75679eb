import { DOTNET } from "../config/pipeline-defaults.js";
import { runStep } from "../utils/process.js";
import type { StageContext } from "./context.js";

/**
 * Compiles the whole solution once; publish and test reuse its output.
 */
export async function buildSolution(ctx: StageContext, buildSuffix: string): Promise<void> {
  await runStep(
    ctx.runner,
    {
      command: DOTNET,
      args: ["build", ctx.config.solution, "--verbosity", ctx.verbosity, "--version-suffix", buildSuffix],
      cwd: ctx.rootDir,
    },
    "build"
  );
}
