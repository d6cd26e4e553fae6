export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function resolveLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const env = (value ?? "info").toLowerCase();
  if (env === "debug" || env === "info" || env === "warn" || env === "error") return env;
  return "info";
}

// ANSI color codes
const c = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
};

export { c as colors };

const levelColors: Record<LogLevel, string> = {
  debug: c.gray,
  info: c.cyan,
  warn: c.yellow,
  error: c.red,
};

function fmt(scope: string, level: LogLevel, msg: string) {
  const ts = new Date().toISOString();
  const lc = levelColors[level];
  return `${c.dim}${ts}${c.reset} ${lc}${level.toUpperCase().padEnd(5)}${c.reset} ${c.magenta}${scope}${c.reset} ${msg}`;
}

let stderrOnly = false;

/** Sends every level to stderr, for processes whose stdout carries a protocol (MCP over stdio). */
export function logToStderr(enabled = true): void {
  stderrOnly = enabled;
}

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/**
 * Scoped console logger. The threshold is read from LOG_LEVEL once per logger,
 * unless one is passed explicitly.
 */
export function createLogger(scope: string, level: LogLevel = resolveLevel()): Logger {
  const should = (l: LogLevel) => levelOrder[l] >= levelOrder[level];

  return {
    debug: (msg: string) => {
      if (should("debug")) (stderrOnly ? console.error : console.debug)(fmt(scope, "debug", msg));
    },
    info: (msg: string) => {
      if (should("info")) (stderrOnly ? console.error : console.log)(fmt(scope, "info", msg));
    },
    warn: (msg: string) => {
      if (should("warn")) console.warn(fmt(scope, "warn", msg));
    },
    error: (msg: string) => {
      if (should("error")) console.error(fmt(scope, "error", msg));
    },
  };
}

export const rootLogger = createLogger("healthsim");
