/**
 * External command execution.
 *
 * Every command carries its own working directory and extra environment; nothing
 * changes the process-wide cwd or env. Stages take a {@link CommandRunner} so tests
 * can substitute an in-process recorder for the real tools.
 */
import { execa } from "execa";
import type { StageName } from "../config/pipeline-defaults.js";
import { PipelineStageError } from "./errors.js";
import { command as echoCommand } from "./logger.js";

export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd: string;
  /** Variables added on top of the inherited environment */
  env?: Record<string, string>;
  /** Pipe and return stdout instead of streaming to the console */
  capture?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

function quoteArg(arg: string): string {
  return /[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg;
}

/**
 * Renders a command the way it would be typed in a shell, for logs.
 */
export function formatCommand(spec: Pick<CommandSpec, "command" | "args">): string {
  return [spec.command, ...spec.args].map(quoteArg).join(" ");
}

/**
 * Default runner. Never rejects on a non-zero exit; a command that fails to
 * spawn or dies on a signal reports exit code 1.
 */
export const execaRunner: CommandRunner = async (spec) => {
  const result = await execa(spec.command, [...spec.args], {
    cwd: spec.cwd,
    env: spec.env,
    reject: false,
    stdin: "ignore",
    stdout: spec.capture ? "pipe" : "inherit",
    stderr: spec.capture ? "pipe" : "inherit",
  });

  const stderr = typeof result.stderr === "string" ? result.stderr : "";
  return {
    exitCode: result.exitCode ?? 1,
    stdout: typeof result.stdout === "string" ? result.stdout : "",
    stderr: result.exitCode === undefined ? `${spec.command} did not run to completion` : stderr,
  };
};

/**
 * Runs a command as a pipeline step: echoes it, then fails the stage on a
 * non-zero exit.
 *
 * @throws PipelineStageError carrying the stage's exit code
 */
export async function runStep(
  runner: CommandRunner,
  spec: CommandSpec,
  stage: StageName,
  exitCode?: PipelineStageError["exitCode"]
): Promise<CommandResult> {
  const line = formatCommand(spec);
  echoCommand(line, spec.cwd);

  const result = await runner(spec);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new PipelineStageError(
      stage,
      `Command failed with exit code ${result.exitCode}: ${line}${detail ? `\n${detail}` : ""}`,
      exitCode
    );
  }
  return result;
}
