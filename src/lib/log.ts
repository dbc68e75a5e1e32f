import { errorMessage } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : "warn";
}

let currentLevel: LogLevel = parseLevel(process.env.CONVERGE_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function logDebug(message: string): void {
  if (enabled("debug")) console.error(`[debug] ${message}`);
}

export function logInfo(message: string): void {
  if (enabled("info")) console.error(message);
}

export function logWarn(message: string): void {
  if (enabled("warn")) console.error(`warning: ${message}`);
}

export function logError(context: string, error: unknown): void {
  if (enabled("error")) console.error(`${context}: ${errorMessage(error)}`);
}
