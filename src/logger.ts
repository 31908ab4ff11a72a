import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = (process.env.CHANNEL_LOG_LEVEL ?? "").toLowerCase();
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Currently active log level.
 */
export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Emit debug-level log entry.
 *
 * @param force - Emit even when the active level is above debug; set from a provider's `debug` setting.
 */
export function debug(message: string, force = false): void {
  if (force || shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit info-level log entry.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit warning to stderr.
 */
export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.warn(formatters.warn(message));
  }
}

/**
 * Emit error-level log entry to stderr.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
