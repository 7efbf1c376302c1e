/**
 * CLI UI
 *
 * Report lines keep the plain `[index] Kind: message` shape so they stay
 * greppable; colour only marks severity.
 */

import {
  type LivenessResult,
  type LivenessStatus,
  type Severity,
  formatViolation,
  type Violation,
} from "@modgate/core";
import chalk from "chalk";

// =============================================================================
// Theme
// =============================================================================

export const theme = {
  title: chalk.white.bold,
  muted: chalk.gray,
  dim: chalk.dim,

  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  path: chalk.white,
} as const;

export const symbols = {
  success: theme.success("✓"),
  error: theme.error("✗"),
  warning: theme.warning("!"),

  add: theme.success("+"),
  remove: theme.error("-"),
  modify: theme.warning("~"),
} as const;

// =============================================================================
// Formatters
// =============================================================================

export function path(p: string): string {
  return theme.path(p);
}

export function muted(text: string): string {
  return theme.muted(text);
}

export function bold(text: string): string {
  return chalk.bold(text);
}

/** Pad string to width, ignoring ANSI codes */
export function pad(text: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(text).length);
  return text + " ".repeat(padding);
}

/**
 * Section header with optional count, e.g. "Added (2)"
 */
export function header(title: string, itemCount?: number): string {
  if (itemCount !== undefined) {
    return `${theme.title(title)} ${theme.muted(`(${itemCount})`)}`;
  }
  return theme.title(title);
}

export function keyValue(key: string, value: string, keyWidth = 12): string {
  return `${theme.muted(pad(key, keyWidth))} ${value}`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

// =============================================================================
// Status messages
// =============================================================================

export function success(message: string): string {
  return `${symbols.success} ${message}`;
}

export function error(message: string): string {
  return `${symbols.error} ${theme.error(message)}`;
}

export function warning(message: string): string {
  return `${symbols.warning} ${message}`;
}

// =============================================================================
// Registry output
// =============================================================================

const severityStyle: Record<Severity, (s: string) => string> = {
  error: theme.error,
  warning: theme.warning,
};

/**
 * A report line, coloured by severity.
 */
export function violation(v: Violation): string {
  return severityStyle[v.severity](formatViolation(v));
}

const livenessStyle: Record<
  LivenessStatus,
  { symbol: string; style: (s: string) => string }
> = {
  ok: { symbol: "✓", style: theme.success },
  missing: { symbol: "✗", style: theme.error },
  "rate-limited": { symbol: "!", style: theme.warning },
  error: { symbol: "!", style: theme.warning },
};

/**
 * e.g. "✓ ok            Acme/Mod  v1.2.0"
 */
export function livenessStatus(result: LivenessResult): string {
  const config = livenessStyle[result.status];
  const detail =
    result.status === "ok"
      ? (result.latestRelease ?? "no releases")
      : (result.message ?? "");
  return `${config.style(config.symbol)} ${config.style(pad(result.status, 13))} ${result.name}  ${theme.muted(detail)}`;
}

// =============================================================================
// Utility
// =============================================================================

/** Strip ANSI codes for width calculations */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ignore
  return str.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

export const ui = {
  theme,
  symbols,

  path,
  muted,
  bold,
  pad,
  header,
  keyValue,
  plural,

  success,
  error,
  warning,

  violation,
  livenessStatus,

  stripAnsi,
};

export default ui;
