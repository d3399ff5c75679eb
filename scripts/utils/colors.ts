/**
 * ANSI color codes for pipeline console output.
 * Disabled when NO_COLOR is set so agent logs stay readable as plain text.
 */

const enabled = !process.env.NO_COLOR;

export const COLORS = {
  RED: enabled ? "\x1b[31m" : "",
  GREEN: enabled ? "\x1b[32m" : "",
  YELLOW: enabled ? "\x1b[33m" : "",
  BLUE: enabled ? "\x1b[34m" : "",
  GRAY: enabled ? "\x1b[90m" : "",
  RESET: enabled ? "\x1b[0m" : "",
} as const;

export const { RED, GREEN, YELLOW, BLUE, GRAY, RESET } = COLORS;
