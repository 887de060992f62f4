// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { DEFAULTS } from "./constants.js";

/**
 * Logger adapter interface for structured logging inside a network.
 *
 * Allows applications to integrate their own logging solutions (Winston, Pino,
 * structured logging services) instead of console output.
 *
 * @example
 * ```typescript
 * import { createNetwork, type LoggerAdapter } from "@topicbus/core";
 *
 * class MyLogger implements LoggerAdapter {
 *   debug(context: string, message: string, data?: unknown) {
 *     console.debug(`[${context}] ${message}`, data);
 *   }
 *   info(context: string, message: string, data?: unknown) {
 *     console.log(`[${context}] ${message}`, data);
 *   }
 *   warn(context: string, message: string, data?: unknown) {
 *     console.warn(`[${context}] ${message}`, data);
 *   }
 *   error(context: string, message: string, data?: unknown) {
 *     console.error(`[${context}] ${message}`, data);
 *   }
 * }
 *
 * const builder = createNetwork<string, string>({ logger: new MyLogger() });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "registry", "publish")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  /**
   * Log an info-level message
   */
  info(context: string, message: string, data?: unknown): void;

  /**
   * Log a warning-level message
   */
  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
  /**
   * Custom log function. Replaces console output when provided.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "warn")
   */
  minLevel?: LogLevel;
}

/**
 * Create a logger adapter with custom configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: "debug",
 *   log: (level, context, message, data) => {
 *     logService.log({ level, context, message, data, timestamp: new Date() });
 *   },
 * });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? DEFAULTS.LOG_LEVEL];

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    console[level](`[${context}] ${message}`, data);
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}
