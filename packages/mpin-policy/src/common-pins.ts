import { readFileSync } from "node:fs";

import { z } from "zod";

import type { PinLength } from "./types";

const COMMON_PINS_FILE = new URL("../data/common-pins.json", import.meta.url);

const pinListSchema = (length: PinLength) =>
  z
    .array(
      z.string().regex(new RegExp(`^\\d{${length}}$`), {
        message: `Common PIN entries must be ${length} digits`,
      }),
    )
    .refine((pins) => new Set(pins).size === pins.length, {
      message: "Common PIN list contains duplicates",
    });

const commonPinFileSchema = z.object({
  "4": pinListSchema(4),
  "6": pinListSchema(6),
});

function loadCommonPins(): Readonly<Record<PinLength, ReadonlySet<string>>> {
  const raw: unknown = JSON.parse(readFileSync(COMMON_PINS_FILE, "utf8"));
  const parsed = commonPinFileSchema.parse(raw);
  return Object.freeze({
    4: new Set(parsed["4"]),
    6: new Set(parsed["6"]),
  });
}

const COMMON_PINS = loadCommonPins();

export function getCommonPins(length: PinLength): ReadonlySet<string> {
  return COMMON_PINS[length];
}

/**
 * Table lookup only; a PIN of any other length is never common.
 */
export function isCommonPin(pin: string): boolean {
  if (pin.length === 4) {
    return COMMON_PINS[4].has(pin);
  }
  if (pin.length === 6) {
    return COMMON_PINS[6].has(pin);
  }
  return false;
}
