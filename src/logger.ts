/**
 * Levelled logger. Writes to stderr; reports go to stdout.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.QUALITY_GAUGE_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
  const prefix = `[${timestamp}] [quality-gauge]`;
  const levelStr = level.toUpperCase().padEnd(5);

  const paint = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
  }[level];

  let output = `${paint(`${prefix} ${levelStr}`)} ${message}`;
  if (data) {
    output += ` ${chalk.dim(JSON.stringify(data))}`;
  }
  return output;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("debug")) {
      console.error(formatMessage("debug", message, data));
    }
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("info")) {
      console.error(formatMessage("info", message, data));
    }
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (shouldLog("warn")) {
      console.error(formatMessage("warn", message, data));
    }
  },

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (shouldLog("error")) {
      const errorData = error instanceof Error
        ? { ...data, error: error.message, stack: error.stack }
        : { ...data, error: String(error) };
      console.error(formatMessage("error", message, errorData));
    }
  },
};
