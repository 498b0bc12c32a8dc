export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const PREFIX = "[clipmon]";

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(order, value);
}

export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== "string") return null;
  const v = value.trim().toLowerCase();
  return isLogLevel(v) ? v : null;
}

function shouldLog(level: Exclude<LogLevel, "silent">) {
  return order[level] >= order[currentLevel];
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(PREFIX, ...args);
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(PREFIX, ...args);
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(PREFIX, ...args);
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(PREFIX, ...args);
}
