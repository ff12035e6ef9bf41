/**
 * Error Logger with Fingerprinting
 *
 * Provides structured error logging with:
 * - Error fingerprinting for grouping similar errors
 * - Context extraction from known error types (InvalidPinError, ZodError)
 * - Consistent log format across the CLI
 */
import { createHash } from "node:crypto";

import {
  InvalidCalendarDateError,
  InvalidPinError,
} from "@mpin-check/policy";
import { ZodError } from "zod";

import { type Logger, logger } from "./logger";
import { sanitizeLogMessage } from "./redact";

/** Matches stack trace location: "at functionName (file:line:col)" or "at file:line:col" */
const STACK_LOCATION_PATTERN = /at\s+(?:(.+?)\s+\()?(.+?):(\d+):\d+\)?/;

/** Matches path prefix up to and including /src/ for normalization */
const SRC_PATH_PREFIX_PATTERN = /^.*?\/src\//;

export interface ErrorContext {
  sessionId?: string;
  operation?: string;
  mode?: "one-shot" | "interactive";
}

/**
 * Extracts structured context from known error types.
 * Carries error codes and shapes only, never the rejected values.
 */
export function extractErrorContext(error: unknown): Record<string, unknown> {
  if (error instanceof InvalidPinError) {
    return {
      errorType: "InvalidPinError",
      code: error.code,
      issue: error.issue,
      pinLength: error.length,
    };
  }
  if (error instanceof InvalidCalendarDateError) {
    return {
      errorType: "InvalidCalendarDateError",
      code: error.code,
    };
  }
  if (error instanceof ZodError) {
    return {
      errorType: "ZodError",
      issueCount: error.issues.length,
      paths: error.issues.map((issue) => issue.path.join(".")),
    };
  }
  return {};
}

/**
 * Extracts the first meaningful stack frame location.
 * Skips node_modules and Node internals.
 */
function getStackLocation(err: Error): string {
  const lines = err.stack?.split("\n") ?? [];
  for (const line of lines.slice(1)) {
    if (line.includes("node_modules") || line.includes("node:")) {
      continue;
    }

    const match = STACK_LOCATION_PATTERN.exec(line);
    if (match) {
      const file = match[2];
      const lineNum = match[3];
      const relativePath =
        file?.replace(SRC_PATH_PREFIX_PATTERN, "src/") ?? "unknown";
      return `${relativePath}:${lineNum}`;
    }
  }
  return "unknown";
}

/**
 * Creates a stable fingerprint for error grouping. The CLI operation and
 * run mode are part of it, and digits are redacted from the message first
 * so the same failure on different PINs groups together.
 */
export function createFingerprint(
  err: Error,
  context: Pick<ErrorContext, "operation" | "mode"> = {},
): string {
  const location = getStackLocation(err);
  const messagePart = sanitizeLogMessage(err.message).slice(0, 100);
  const scope = `${context.operation ?? "-"}/${context.mode ?? "-"}`;
  const input = `${scope}:${err.name}:${messagePart}:${location}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 12);
}

/**
 * Log an error with context and fingerprinting.
 * Returns the fingerprint so the CLI can print it as a reference.
 */
export function logError(
  error: unknown,
  context: ErrorContext = {},
  log: Logger = logger,
): string {
  const err = error instanceof Error ? error : new Error(String(error));
  const safeMessage = sanitizeLogMessage(err.message);
  const fingerprint = createFingerprint(err, context);
  const errorContext = extractErrorContext(error);
  const safeStack = err.stack
    ? err.stack.replace(err.message, safeMessage)
    : undefined;

  log.error(
    {
      ...context,
      ...errorContext,
      fingerprint,
      error: {
        name: err.name,
        message: safeMessage,
        stack: safeStack,
      },
    },
    `[${fingerprint}] ${safeMessage}`,
  );

  return fingerprint;
}

/**
 * Log a warning for expected failures (validation, usage).
 * Does not include stack traces - these are expected conditions.
 */
export function logWarn(
  message: string,
  context: Record<string, unknown> = {},
  log: Logger = logger,
): void {
  log.warn(context, sanitizeLogMessage(message));
}
