/**
 * Micro-logger wrapper — minimal logging with level filtering
 * Wraps console.*; threshold comes from LOG_LEVEL
 */

import type { LogLevel, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants/logger";

type Meta = Record<string, unknown>;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve a level name from the environment, falling back to the default
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

const currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env.LOG_LEVEL)];

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Meta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
      break;
    case "error":
      console.error(logMessage);
      break;
  }
}

export function debug(message: string, meta?: Meta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Meta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Meta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Meta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: Meta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
