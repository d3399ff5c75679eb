/**
 * Shared logging utilities for the pipeline stages
 * Provides consistent colored output. Build issues for the agent go through
 * `AzurePipelines.logIssue`, not through here.
 */
import { BLUE, GRAY, GREEN, RED, RESET, YELLOW } from "./colors.js";

/**
 * Test project result
 */
export type TestResult = {
  name: string;
  passed: boolean;
  duration?: number;
  error?: string;
};

/**
 * Print success message with green ✅ prefix
 */
export function success(msg: string): void {
  console.log(`${GREEN}✅ ${msg}${RESET}`);
}

/**
 * Print error message with red ❌ prefix
 */
export function error(msg: string, err?: unknown): void {
  const message = `${RED}❌ ${msg}${RESET}`;
  if (err !== undefined) console.error(message, err);
  else console.error(message);
}

/**
 * Print warning message with yellow ⚠️ prefix
 */
export function warning(msg: string, err?: unknown): void {
  const message = `${YELLOW}⚠️  ${msg}${RESET}`;
  if (err !== undefined) console.warn(message, err);
  else console.warn(message);
}

/**
 * Print info message with blue ℹ️ prefix
 */
export function info(msg: string): void {
  console.log(`${BLUE}ℹ️  ${msg}${RESET}`);
}

/**
 * Echo an external command before it runs
 */
export function command(line: string, cwd?: string): void {
  const location = cwd ? ` ${GRAY}(in ${cwd})${RESET}` : "";
  console.log(`${GRAY}$${RESET} ${line}${location}`);
}

/**
 * Print section separator with title
 */
export function section(title: string): void {
  console.log(`\n${"=".repeat(60)}`);
  console.log(`  ${title}`);
  console.log("=".repeat(60));
}

export function separator(char: string = "="): void {
  console.log(char.repeat(60));
}

export function testResult(name: string, passed: boolean, duration?: number): void {
  const prefix = passed ? `${GREEN}✅` : `${RED}❌`;
  const durationStr = duration !== undefined ? ` (${formatDuration(duration)})` : "";
  console.log(`${prefix} ${name}${durationStr}${RESET}`);
}

/**
 * Print formatted test summary table
 */
export function testSummary(results: TestResult[]): void {
  separator();
  console.log("TEST SUMMARY");
  separator("-");

  const passed = results.filter((r) => r.passed).length;
  const failed = results.length - passed;

  for (const result of results) {
    testResult(result.name, result.passed, result.duration);
    if (!result.passed && result.error) {
      console.log(`   ${RED}${result.error}${RESET}`);
    }
  }

  separator("-");
  console.log(
    `Total: ${results.length} | ${GREEN}Passed: ${passed}${RESET} | ${RED}Failed: ${failed}${RESET}`
  );
  separator();
}

/**
 * Format milliseconds to human-readable duration
 * @example formatDuration(1500) // "1.50s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }
}
