// INPUT: process.env.LOG_LEVEL
// OUTPUT: log, LogLevel
// POS: Leveled console logger shared by every module

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function configuredLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return ORDER.find((level) => level === raw) ?? "info";
}

function shouldLog(level: LogLevel) {
  return ORDER.indexOf(level) >= ORDER.indexOf(configuredLevel());
}

export const log = {
  debug: (...args: unknown[]) => {
    if (shouldLog("debug")) console.debug(...args);
  },
  info: (...args: unknown[]) => {
    if (shouldLog("info")) console.info(...args);
  },
  warn: (...args: unknown[]) => {
    if (shouldLog("warn")) console.warn(...args);
  },
  error: (...args: unknown[]) => {
    if (shouldLog("error")) console.error(...args);
  },
};
