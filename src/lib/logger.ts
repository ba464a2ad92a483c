/**
 * Diagnostic logging with Winston.
 *
 * Everything goes to stderr; stdout is reserved for outcome records.
 */

import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "warn",
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: "orderbook" },
    transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
  });
}

export type Logger = winston.Logger;
