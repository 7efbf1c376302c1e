/**
 * CLI Logging
 *
 * - stdout: reports and results (can be piped or diffed in CI)
 * - stderr: status, warnings, errors, debug
 *
 * `--verbose` or DEBUG=1 turns on debug output.
 */

import { ui } from "@/lib/ui";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function levelFromEnv(): LogLevel {
  const flag = process.env.DEBUG;
  return flag === "1" || flag === "true" ? "debug" : "info";
}

let currentLevel: LogLevel = levelFromEnv();

function setVerbose(verbose: boolean) {
  currentLevel = verbose ? "debug" : levelFromEnv();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/** Raw output to stdout */
function print(message: string) {
  console.log(message);
}

function debug(message: string) {
  if (shouldLog("debug")) {
    console.error(ui.theme.dim(`[debug] ${message}`));
  }
}

function info(message: string) {
  if (shouldLog("info")) {
    console.error(message);
  }
}

function warn(message: string) {
  if (shouldLog("warn")) {
    console.error(ui.warning(message));
  }
}

/** Always shown */
function error(message: string) {
  console.error(ui.error(message));
}

function success(message: string) {
  if (shouldLog("info")) {
    console.error(ui.success(message));
  }
}

// =============================================================================
// Spinner
// =============================================================================

export type Spinner = {
  update: (message: string) => void;
  stop: () => void;
};

let oraModule: typeof import("ora") | null = null;

async function getOra() {
  if (!oraModule) {
    oraModule = await import("ora");
  }
  return oraModule.default;
}

/**
 * Spinner for network-bound work. Falls back to plain status lines when
 * stderr is not a terminal.
 */
async function spinner(message: string): Promise<Spinner> {
  if (!process.stderr.isTTY) {
    info(message);
    return {
      update: (msg: string) => debug(msg),
      stop: () => {
        /* nothing to clear */
      },
    };
  }

  const ora = await getOra();
  const s = ora({ text: message, spinner: "dots", color: "cyan" }).start();

  return {
    update: (msg: string) => {
      s.text = msg;
    },
    stop: () => {
      s.stop();
    },
  };
}

export const log = {
  setVerbose,

  print,
  debug,
  info,
  warn,
  error,
  success,

  spinner,
};

export { ui } from "@/lib/ui";
