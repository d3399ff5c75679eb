/**
 * Error handling utilities
 */
import { EXIT_CODES, type ExitCode, type StageName } from "../config/pipeline-defaults.js";

/**
 * Extracts error message from unknown error value
 * @param err - Unknown error value (Error, string, or other)
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Formats error for logging with optional context
 * @param context - Optional context string (e.g., stage name)
 */
export function formatError(err: unknown, context?: string): string {
  const message = getErrorMessage(err);
  return context ? `${context}: ${message}` : message;
}

/**
 * Fatal failure of a pipeline stage. Carries the process exit code the
 * pipeline terminates with, so callers can tell build failures from test failures.
 */
export class PipelineStageError extends Error {
  constructor(
    readonly stage: StageName,
    message: string,
    readonly exitCode: ExitCode = EXIT_CODES.buildFailure
  ) {
    super(message);
    this.name = "PipelineStageError";
  }
}
