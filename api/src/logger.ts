import { settings, type LogLevel } from "./config.js";

const RANK: Record<LogLevel, number> = {
  silent: 99,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const threshold = RANK[settings.logLevel];

function logAt(level: Exclude<LogLevel, "silent">, args: unknown[]) {
  if (RANK[level] < threshold) return;
  const line = [new Date().toISOString(), level.toUpperCase(), ...args];
  if (level === "error") console.error(...line);
  else if (level === "warn") console.warn(...line);
  else console.log(...line);
}

export const logger = {
  error: (...args: unknown[]) => logAt("error", args),
  warn: (...args: unknown[]) => logAt("warn", args),
  info: (...args: unknown[]) => logAt("info", args),
  debug: (...args: unknown[]) => logAt("debug", args),
};
