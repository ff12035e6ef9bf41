export const PIN_LENGTHS = [4, 6] as const;

export type PinLength = (typeof PIN_LENGTHS)[number];

/** Matches ASCII decimal digits only */
export const DIGITS_ONLY_PATTERN = /^[0-9]*$/;

declare const pinBrand: unique symbol;

/** A PIN that passed format and length validation. */
export type Pin = string & { readonly [pinBrand]: true };

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export const DEMOGRAPHIC_ROLES = ["dob_self", "dob_spouse", "anniversary"] as const;

export type DemographicRole = (typeof DEMOGRAPHIC_ROLES)[number];

/**
 * Personal dates a PIN is checked against. Absent roles contribute nothing.
 */
export type Demographics = {
  readonly [role in DemographicRole]?: CalendarDate | null;
};

export const REASON_CODES = [
  "COMMONLY_USED",
  "DEMOGRAPHIC_ANNIVERSARY",
  "DEMOGRAPHIC_DOB_SELF",
  "DEMOGRAPHIC_DOB_SPOUSE",
] as const;

export type ReasonCode = (typeof REASON_CODES)[number];

export type PinStrength = "STRONG" | "WEAK";

export interface ClassificationResult {
  readonly strength: PinStrength;
  /** Sorted by tag name. Empty iff strength is STRONG. */
  readonly reasons: readonly ReasonCode[];
}

export type DatePatternLayout =
  | "dd-mm"
  | "mm-dd"
  | "yyyy"
  | "dd-yy"
  | "yy-dd"
  | "mm-yy"
  | "yy-mm"
  | "dd-dd"
  | "mm-mm"
  | "yy-yy"
  | "dd-mm-yy"
  | "mm-dd-yy"
  | "yy-mm-dd"
  | "yy-dd-mm";

export interface DatePattern {
  readonly layout: DatePatternLayout;
  readonly value: string;
}

export type PinMatch =
  | { readonly reason: "COMMONLY_USED" }
  | {
      readonly reason: Exclude<ReasonCode, "COMMONLY_USED">;
      readonly role: DemographicRole;
      readonly layout: DatePatternLayout;
    };

export interface PinExplanation {
  readonly result: ClassificationResult;
  readonly matches: readonly PinMatch[];
}

export interface PinRequirementStatus {
  lengthOk: boolean;
  digitsOnly: boolean;
  notCommon: boolean;
  noDobSelf: boolean;
  noDobSpouse: boolean;
  noAnniversary: boolean;
}
