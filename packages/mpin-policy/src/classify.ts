import { isValidCalendarDate } from "./calendar-date";
import { isCommonPin } from "./common-pins";
import { generateDatePatterns, listDatePatterns } from "./date-patterns";
import { InvalidPinError } from "./errors";
import {
  type CalendarDate,
  type ClassificationResult,
  DEMOGRAPHIC_ROLES,
  DIGITS_ONLY_PATTERN,
  type DemographicRole,
  type Demographics,
  type Pin,
  type PinExplanation,
  type PinLength,
  type PinMatch,
  type PinRequirementStatus,
  type ReasonCode,
} from "./types";

const ROLE_REASONS: Record<
  DemographicRole,
  Exclude<ReasonCode, "COMMONLY_USED">
> = {
  dob_self: "DEMOGRAPHIC_DOB_SELF",
  dob_spouse: "DEMOGRAPHIC_DOB_SPOUSE",
  anniversary: "DEMOGRAPHIC_ANNIVERSARY",
};

function isPinLength(length: number): length is PinLength {
  return length === 4 || length === 6;
}

export function isValidPin(pin: string): pin is Pin {
  return DIGITS_ONLY_PATTERN.test(pin) && isPinLength(pin.length);
}

export function assertValidPin(pin: string): asserts pin is Pin {
  if (!DIGITS_ONLY_PATTERN.test(pin)) {
    throw new InvalidPinError({ issue: "not_digits", length: pin.length });
  }
  if (!isPinLength(pin.length)) {
    throw new InvalidPinError({ issue: "bad_length", length: pin.length });
  }
}

function pinLengthOf(pin: Pin): PinLength {
  return pin.length === 4 ? 4 : 6;
}

interface RoleDate {
  role: DemographicRole;
  date: CalendarDate;
}

// Absent and impossible dates carry no signal.
function presentRoles(demographics: Demographics | undefined): RoleDate[] {
  if (!demographics) {
    return [];
  }
  return DEMOGRAPHIC_ROLES.flatMap((role) => {
    const date = demographics[role];
    return date && isValidCalendarDate(date) ? [{ role, date }] : [];
  });
}

interface CheckPlan {
  pin: Pin;
  length: PinLength;
  common: boolean;
  roles: RoleDate[];
}

function planChecks(
  pin: string,
  demographics: Demographics | undefined,
): CheckPlan {
  assertValidPin(pin);
  return {
    pin,
    length: pinLengthOf(pin),
    common: isCommonPin(pin),
    roles: presentRoles(demographics),
  };
}

function toResult(reasons: ReadonlySet<ReasonCode>): ClassificationResult {
  const sorted = [...reasons].sort();
  return {
    strength: sorted.length > 0 ? "WEAK" : "STRONG",
    reasons: sorted,
  };
}

/**
 * Classifies a 4 or 6 digit PIN as STRONG or WEAK.
 *
 * A PIN is WEAK when it appears in the common-PIN table for its length, or
 * when it equals a digit arrangement of one of the supplied personal dates.
 * Reasons come back sorted by tag name.
 *
 * Absent or impossible dates add no reason.
 *
 * @throws InvalidPinError when `pin` is not all digits or not 4/6 long
 */
export function classifyPin(
  pin: string,
  demographics?: Demographics,
): ClassificationResult {
  const plan = planChecks(pin, demographics);
  const reasons = new Set<ReasonCode>();

  if (plan.common) {
    reasons.add("COMMONLY_USED");
  }
  for (const { role, date } of plan.roles) {
    if (generateDatePatterns(date, plan.length).has(plan.pin)) {
      reasons.add(ROLE_REASONS[role]);
    }
  }

  return toResult(reasons);
}

/**
 * Same verdict as {@link classifyPin}, plus every rule that fired: which
 * role and which date arrangement produced the PIN.
 */
export function explainPin(
  pin: string,
  demographics?: Demographics,
): PinExplanation {
  const plan = planChecks(pin, demographics);
  const matches: PinMatch[] = [];

  if (plan.common) {
    matches.push({ reason: "COMMONLY_USED" });
  }
  for (const { role, date } of plan.roles) {
    for (const pattern of listDatePatterns(date, plan.length)) {
      if (pattern.value === plan.pin) {
        matches.push({
          reason: ROLE_REASONS[role],
          role,
          layout: pattern.layout,
        });
      }
    }
  }

  return {
    result: toResult(new Set(matches.map((m) => m.reason))),
    matches,
  };
}

/**
 * Checklist flags for live feedback while a PIN is typed. Never throws:
 * the table and date checks report `true` until the PIN is well-formed.
 */
export function getPinRequirementStatus(
  pin: string,
  demographics?: Demographics,
): PinRequirementStatus {
  const digitsOnly = DIGITS_ONLY_PATTERN.test(pin);
  const lengthOk = isPinLength(pin.length);

  const status: PinRequirementStatus = {
    lengthOk,
    digitsOnly,
    notCommon: true,
    noDobSelf: true,
    noDobSpouse: true,
    noAnniversary: true,
  };
  if (!isValidPin(pin)) {
    return status;
  }

  const { length, common, roles } = planChecks(pin, demographics);
  const matchesRole = (role: DemographicRole) =>
    roles.some(
      (entry) =>
        entry.role === role &&
        generateDatePatterns(entry.date, length).has(pin),
    );

  status.notCommon = !common;
  status.noDobSelf = !matchesRole("dob_self");
  status.noDobSpouse = !matchesRole("dob_spouse");
  status.noAnniversary = !matchesRole("anniversary");
  return status;
}
