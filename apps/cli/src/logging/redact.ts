/**
 * PIN and Date Redaction Utilities
 *
 * Canonical list of sensitive field names that must be redacted from logs.
 * Used by both Pino's built-in redaction and manual sanitization.
 */

/**
 * Keys that should always be redacted from logs.
 * This is the canonical list - referenced in logger.ts for Pino redaction paths.
 */
export const REDACT_KEYS = new Set([
  // PIN fields
  "pin",
  "mpin",
  "newPin",
  "confirmPin",

  // Personal dates
  "demographics",
  "dob_self",
  "dob_spouse",
  "anniversary",
  "dob",
  "birthDate",
  "dateOfBirth",

  // Credentials
  "password",
  "secret",
  "token",
]);

const ISO_DATE_PATTERN = /\b\d{4}-\d{2}-\d{2}\b/g;
const DIGIT_RUN_PATTERN = /\b\d{4,}\b/g;

/**
 * Sanitize free-form log messages so PINs and personal dates never reach
 * the log stream. Dates are replaced first so their year is not reported
 * as a separate number.
 */
export function sanitizeLogMessage(message: string): string {
  if (!message) return message;

  let output = message;
  output = output.replace(ISO_DATE_PATTERN, "[redacted-date]");
  output = output.replace(DIGIT_RUN_PATTERN, "[redacted-number]");

  if (output.length > 500) {
    output = `${output.slice(0, 200)}…[truncated:${output.length}]`;
  }

  return output;
}

/**
 * Deep sanitizes an object for logging, handling edge cases that
 * Pino's built-in redact might miss (dynamic keys, deep nesting).
 */
export function sanitizeForLog(
  value: unknown,
  depth = 0,
  seen?: WeakSet<object>,
): unknown {
  if (depth > 4) return "[max-depth]";

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeLogMessage(value.message),
    };
  }

  if (typeof value === "string") {
    if (value.length > 500) {
      return `[string:${value.length}]`;
    }
    return sanitizeLogMessage(value);
  }

  if (Array.isArray(value)) {
    if (value.length > 20) {
      return `[array:${value.length}]`;
    }
    return value.map((v) => sanitizeForLog(v, depth + 1, seen));
  }

  if (value && typeof value === "object") {
    const set = seen ?? new WeakSet<object>();
    if (set.has(value)) return "[circular]";
    set.add(value);

    const out: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      out[key] = REDACT_KEYS.has(key)
        ? "[REDACTED]"
        : sanitizeForLog(val, depth + 1, set);
    }
    return out;
  }

  return value;
}

/**
 * Extract safe metadata from input for logging.
 * Never logs actual values - only which fields were supplied.
 */
export function extractInputMeta(input: unknown): Record<string, unknown> {
  if (!input || typeof input !== "object") {
    return { inputType: typeof input };
  }

  const entries = Object.entries(input);
  const present = entries
    .filter(([, value]) => value !== undefined && value !== null && value !== "")
    .map(([key]) => key);

  return {
    inputKeys: present.length > 0 ? present : undefined,
    redactedKeys: present.filter((k) => REDACT_KEYS.has(k)).length,
  };
}
