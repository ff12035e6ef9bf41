import { z } from "zod";

import { tryParseCalendarDate } from "./calendar-date";
import { getInvalidPinMessage } from "./errors";
import { type Demographics, DIGITS_ONLY_PATTERN } from "./types";

export const pinSchema = z
  .string()
  .regex(DIGITS_ONLY_PATTERN, { message: getInvalidPinMessage("not_digits") })
  .refine((pin) => pin.length === 4 || pin.length === 6, {
    message: getInvalidPinMessage("bad_length"),
  });

export const calendarDateSchema = z.string().transform((text, ctx) => {
  const date = tryParseCalendarDate(text);
  if (!date) {
    ctx.issues.push({
      code: "custom",
      message: "Date must be a real calendar date in YYYY-MM-DD format",
      input: text,
    });
    return z.NEVER;
  }
  return date;
});

// Blank form fields mean "not provided".
const optionalDateSchema = z
  .string()
  .trim()
  .optional()
  .transform((text) => (text ? text : undefined))
  .pipe(calendarDateSchema.optional());

export const demographicsInputSchema = z.object({
  dob_self: optionalDateSchema,
  dob_spouse: optionalDateSchema,
  anniversary: optionalDateSchema,
});

export const classifyRequestSchema = z.object({
  pin: pinSchema,
  demographics: demographicsInputSchema.optional(),
});

export type ClassifyRequestInput = z.input<typeof classifyRequestSchema>;

export interface ClassifyRequest {
  pin: string;
  demographics: Demographics;
}

/**
 * Validates request-shaped input (e.g. parsed JSON or CLI flags).
 * @throws ZodError
 */
export function parseClassifyRequest(input: unknown): ClassifyRequest {
  const parsed = classifyRequestSchema.parse(input);
  return {
    pin: parsed.pin,
    demographics: parsed.demographics ?? {},
  };
}
