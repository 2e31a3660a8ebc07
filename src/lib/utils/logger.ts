/**
 * Structured Logging Utility
 *
 * Provides consistent logging with:
 * - Log levels (debug, info, warn, error)
 * - Environment-based filtering (OPEN_PREP_LOG_LEVEL / LOG_LEVEL)
 * - Structured data logging
 * - Correlation IDs for tracing a single pipeline run
 */

import { getEnvVar, isProductionEnv, isTestEnv } from "../env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

let correlationCounter = 0;
export function generateCorrelationId(prefix = "op"): string {
  return `${prefix}-${Date.now()}-${++correlationCounter}`;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

/**
 * Minimum log level from environment
 * Test: error (keeps vitest output readable)
 * Production: info
 * Development: debug
 */
export function getMinLogLevel(): LogLevel {
  const envLevel = (getEnvVar("OPEN_PREP_LOG_LEVEL") ?? getEnvVar("LOG_LEVEL"))?.toLowerCase();

  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  if (isTestEnv()) return "error";
  return isProductionEnv() ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  // Read per call so the worker can change the level after dotenv loads
  return LOG_LEVELS[level] >= LOG_LEVELS[getMinLogLevel()];
}

/**
 * Format log message with timestamp and context
 */
export function formatMessage(
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown,
  timestamp: string = new Date().toISOString()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `[${timestamp}] ${levelStr} [${context}] ${message}`;

  if (data !== undefined) {
    formatted += ` ${safeStringify(data)}`;
  }

  return formatted;
}

function safeStringify(data: unknown): string {
  try {
    return JSON.stringify(data, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    );
  } catch {
    return String(data);
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a logger for a specific context/component
 *
 * @example
 * const logger = createLogger('OpenPrepPipeline');
 * logger.info('Run complete', { ranked: 12 });
 */
export function createLogger(context: string): Logger {
  return {
    debug: (message, data) => {
      if (shouldLog("debug")) {
        console.debug(formatMessage("debug", context, message, data));
      }
    },

    info: (message, data) => {
      if (shouldLog("info")) {
        console.info(formatMessage("info", context, message, data));
      }
    },

    warn: (message, data) => {
      if (shouldLog("warn")) {
        console.warn(formatMessage("warn", context, message, data));
      }
    },

    error: (message, data) => {
      if (shouldLog("error")) {
        console.error(formatMessage("error", context, message, data));
      }
    },
  };
}

/**
 * Convenience function for performance logging
 *
 * @example
 * const end = logPerformance('OpenPrepPipeline', 'score');
 * // ... do work ...
 * end(); // Logs duration
 */
export function logPerformance(context: string, operation: string): () => number {
  const start = performance.now();
  const log = createLogger(context);

  return () => {
    const duration = performance.now() - start;
    log.debug(`${operation} completed`, { durationMs: duration.toFixed(2) });
    return duration;
  };
}
