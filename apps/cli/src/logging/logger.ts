/**
 * Pino Logger Configuration
 *
 * Single source of truth for structured logging configuration.
 * - JSON output in production, pretty-print in development
 * - Always written to stderr; stdout is reserved for results
 * - Built-in PIN/date redaction via Pino's redact option
 * - Child loggers per CLI session
 */
import pino, { type Logger, type LoggerOptions } from "pino";

import { type CliEnv, loadEnv } from "../env";
import { REDACT_KEYS } from "./redact";

const redactPaths = [
  ...REDACT_KEYS,
  // Canonical redaction keys (nested with wildcard)
  ...Array.from(REDACT_KEYS, (key) => `*.${key}`),
];

export function buildLoggerOptions(env: CliEnv): LoggerOptions {
  return {
    level: env.logLevel,

    // Base context for all logs
    base: {
      service: "mpin-check",
      env: env.nodeEnv,
    },

    // Pino's built-in redaction (fast, runs before serialization)
    redact: {
      paths: redactPaths,
      censor: "[REDACTED]",
    },

    serializers: {
      err: pino.stdSerializers.err,
    },
  };
}

function createLogger(env: CliEnv): Logger {
  const options = buildLoggerOptions(env);

  // Pretty-print in dev, structured JSON otherwise; both on stderr
  if (env.nodeEnv === "development") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino(options, pino.destination(2));
}

/**
 * Base logger instance - created once at module load.
 * Use createSessionLogger() for session-scoped logging.
 */
export const logger: Logger = createLogger(loadEnv());

/**
 * Creates a child logger scoped to one CLI run or interactive session.
 *
 * @param sessionId - Unique ID for the session (UUID)
 */
export function createSessionLogger(sessionId: string): Logger {
  return logger.child({ sessionId });
}

/**
 * Check if debug logging is enabled (LOG_LEVEL=debug).
 */
export function isDebugEnabled(): boolean {
  return logger.isLevelEnabled("debug");
}

export type { Logger };
