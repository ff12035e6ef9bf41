/**
 * Structured Logging Module
 *
 * @example
 * ```ts
 * import { createSessionLogger, logError } from "./logging";
 * const log = createSessionLogger(randomUUID());
 * log.info({ strength, reasonCount }, "PIN classified");
 * const fingerprint = logError(error, { operation: "cli.run" }, log);
 * ```
 */

export {
  createFingerprint,
  type ErrorContext,
  extractErrorContext,
  logError,
  logWarn,
} from "./error-logger";
export {
  buildLoggerOptions,
  createSessionLogger,
  isDebugEnabled,
  type Logger,
  logger,
} from "./logger";
export {
  extractInputMeta,
  REDACT_KEYS,
  sanitizeForLog,
  sanitizeLogMessage,
} from "./redact";
