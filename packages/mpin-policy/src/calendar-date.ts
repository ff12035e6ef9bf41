import { InvalidCalendarDateError } from "./errors";
import type { CalendarDate } from "./types";

/** Matches a strict ISO calendar date: YYYY-MM-DD */
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MAX_YEAR = 9999;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) {
    return false;
  }
  if (year < 0 || year > MAX_YEAR) {
    return false;
  }
  if (month < 1 || month > 12) {
    return false;
  }
  return day >= 1 && day <= daysInMonth(year, month);
}

export function assertValidCalendarDate(date: CalendarDate): void {
  if (!isValidCalendarDate(date)) {
    throw new InvalidCalendarDateError("Date is not a valid calendar date");
  }
}

/**
 * Parses `YYYY-MM-DD`. Rejects other layouts and dates that do not exist,
 * such as 2023-02-29.
 */
export function parseCalendarDate(text: string): CalendarDate {
  const match = ISO_DATE_PATTERN.exec(text);
  if (!match) {
    throw new InvalidCalendarDateError("Date must use the YYYY-MM-DD format");
  }

  const date: CalendarDate = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
  assertValidCalendarDate(date);
  return date;
}

export function tryParseCalendarDate(text: string): CalendarDate | undefined {
  try {
    return parseCalendarDate(text);
  } catch (error) {
    if (error instanceof InvalidCalendarDateError) {
      return;
    }
    throw error;
  }
}

export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, "0");
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
