import { PIN_LENGTHS } from "./types";

export type InvalidPinIssue = "not_digits" | "bad_length";

const INVALID_PIN_MESSAGES: Record<InvalidPinIssue, string> = {
  not_digits: "PIN must contain only digits 0-9",
  bad_length: `PIN must be ${PIN_LENGTHS.join(" or ")} digits long`,
};

export function getInvalidPinMessage(issue: InvalidPinIssue): string {
  return INVALID_PIN_MESSAGES[issue];
}

/**
 * Raised when a PIN fails format or length validation.
 * The message never echoes the rejected value.
 */
export class InvalidPinError extends Error {
  readonly code = "INVALID_INPUT";
  readonly issue: InvalidPinIssue;
  readonly length: number;

  constructor(args: { issue: InvalidPinIssue; length: number }) {
    super(getInvalidPinMessage(args.issue));
    this.name = "InvalidPinError";
    this.issue = args.issue;
    this.length = args.length;
  }
}

export class InvalidCalendarDateError extends Error {
  readonly code = "INVALID_DATE";

  constructor(message: string) {
    super(message);
    this.name = "InvalidCalendarDateError";
  }
}
