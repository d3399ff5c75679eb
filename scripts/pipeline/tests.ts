import { DOTNET, EXIT_CODES } from "../config/pipeline-defaults.js";
import { PipelineStageError } from "../utils/errors.js";
import { command as echoCommand, testSummary, type TestResult } from "../utils/logger.js";
import { formatCommand, type CommandSpec } from "../utils/process.js";
import type { StageContext } from "./context.js";

/**
 * Runs the test projects one after another against the compiled solution.
 *
 * `env` reaches only the test processes (database connection strings).
 * The first failing project ends the stage with the test-failure exit code.
 *
 * @throws PipelineStageError with exit code 3 on the first failing project
 */
export async function runTestProjects(ctx: StageContext, env: Record<string, string>): Promise<TestResult[]> {
  const results: TestResult[] = [];

  for (const project of ctx.config.tests) {
    const spec: CommandSpec = {
      command: DOTNET,
      args: ["test", project, "--no-restore", "--no-build", "--verbosity", ctx.verbosity],
      cwd: ctx.rootDir,
      env,
    };
    echoCommand(formatCommand(spec), spec.cwd);

    const startTime = Date.now();
    const result = await ctx.runner(spec);
    const passed = result.exitCode === 0;
    results.push({
      name: project,
      passed,
      duration: Date.now() - startTime,
      error: passed ? undefined : `exit code ${result.exitCode}`,
    });

    if (!passed) {
      testSummary(results);
      throw new PipelineStageError("test", `Tests failed in ${project}`, EXIT_CODES.testFailure);
    }
  }

  testSummary(results);
  return results;
}
