import type {
  CalendarDate,
  DatePattern,
  DatePatternLayout,
  PinLength,
} from "./types";

interface DateFields {
  dd: string;
  mm: string;
  yy: string;
  yyyy: string;
}

type LayoutBuilder = readonly [DatePatternLayout, (f: DateFields) => string];

// Six-digit PINs get no yyyy-based arrangement.
const LAYOUTS: Record<PinLength, readonly LayoutBuilder[]> = {
  4: [
    ["dd-mm", (f) => f.dd + f.mm],
    ["mm-dd", (f) => f.mm + f.dd],
    ["yyyy", (f) => f.yyyy],
    ["dd-yy", (f) => f.dd + f.yy],
    ["yy-dd", (f) => f.yy + f.dd],
    ["mm-yy", (f) => f.mm + f.yy],
    ["yy-mm", (f) => f.yy + f.mm],
    ["dd-dd", (f) => f.dd + f.dd],
    ["mm-mm", (f) => f.mm + f.mm],
    ["yy-yy", (f) => f.yy + f.yy],
  ],
  6: [
    ["dd-mm-yy", (f) => f.dd + f.mm + f.yy],
    ["mm-dd-yy", (f) => f.mm + f.dd + f.yy],
    ["yy-mm-dd", (f) => f.yy + f.mm + f.dd],
    ["yy-dd-mm", (f) => f.yy + f.dd + f.mm],
  ],
};

function toFields(date: CalendarDate): DateFields {
  return {
    dd: String(date.day).padStart(2, "0"),
    mm: String(date.month).padStart(2, "0"),
    yy: String(date.year % 100).padStart(2, "0"),
    yyyy: String(date.year).padStart(4, "0"),
  };
}

/**
 * Lists every date arrangement checked for PINs of `length`, in a fixed
 * order. Values may repeat (e.g. when day equals month).
 */
export function listDatePatterns(
  date: CalendarDate | null | undefined,
  length: PinLength,
): readonly DatePattern[] {
  if (!date) {
    return [];
  }
  const fields = toFields(date);
  return LAYOUTS[length].map(([layout, build]) => ({
    layout,
    value: build(fields),
  }));
}

/**
 * Digit strings of `length` derivable from `date`. At most 10 entries for
 * four digits and 4 for six.
 */
export function generateDatePatterns(
  date: CalendarDate | null | undefined,
  length: PinLength,
): ReadonlySet<string> {
  return new Set(listDatePatterns(date, length).map((p) => p.value));
}
