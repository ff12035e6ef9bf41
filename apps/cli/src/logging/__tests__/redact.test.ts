import { describe, expect, it } from "vitest";

import {
  extractInputMeta,
  REDACT_KEYS,
  sanitizeForLog,
  sanitizeLogMessage,
} from "../redact";

describe("logging redaction", () => {
  it("redacts PINs and dates in log messages", () => {
    expect(sanitizeLogMessage("PIN 1508 for 1992-08-15 rejected")).toBe(
      "PIN [redacted-number] for [redacted-date] rejected",
    );
  });

  it("leaves short numbers alone", () => {
    expect(sanitizeLogMessage("attempt 3 of 123")).toBe("attempt 3 of 123");
  });

  it("truncates very long messages", () => {
    const output = sanitizeLogMessage("x".repeat(600));
    expect(output).toBe(`${"x".repeat(200)}…[truncated:600]`);
  });

  it("sanitizes objects and handles circular references", () => {
    const obj: Record<string, unknown> = { safe: "ok" };
    obj.self = obj;
    const output = sanitizeForLog(obj);

    expect(output).toEqual({ safe: "ok", self: "[circular]" });
  });

  it("redacts known sensitive keys", () => {
    const output = sanitizeForLog({
      pin: "4821",
      dob_self: { year: 1992, month: 8, day: 15 },
      attempt: 2,
      note: "PIN 4821",
    });

    expect(output).toEqual({
      pin: "[REDACTED]",
      dob_self: "[REDACTED]",
      attempt: 2,
      note: "PIN [redacted-number]",
    });
  });

  it("extracts which fields were supplied without their values", () => {
    const meta = extractInputMeta({
      dob_self: { year: 1992, month: 8, day: 15 },
      dob_spouse: undefined,
      anniversary: null,
    });

    expect(meta).toEqual({ inputKeys: ["dob_self"], redactedKeys: 1 });
    expect(extractInputMeta("1234")).toEqual({ inputType: "string" });
    expect(REDACT_KEYS.has("pin")).toBe(true);
  });
});
