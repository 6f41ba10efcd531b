/* ================================
   SIMPLE LOGGER
================================ */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const defaultLevel = (): LogLevel => {
  if (isLogLevel(process.env.LOG_LEVEL)) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === "production") return "info";
  if (process.env.NODE_ENV === "test") return "silent";
  return "debug";
};

const threshold = LOG_LEVELS.indexOf(defaultLevel());

const enabled = (level: Exclude<LogLevel, "silent">) =>
  LOG_LEVELS.indexOf(level) >= threshold;

export const logger = {
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error(...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn(...args);
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.log(...args);
  },
  // token failure reasons and other internal diagnostics go here
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.log(...args);
  },
};
