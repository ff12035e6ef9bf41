import type { DatePatternLayout, ReasonCode } from "./types";

const REASON_MESSAGES: Record<ReasonCode, string> = {
  COMMONLY_USED: "PIN is on the list of commonly guessed codes",
  DEMOGRAPHIC_ANNIVERSARY: "PIN can be derived from your anniversary date",
  DEMOGRAPHIC_DOB_SELF: "PIN can be derived from your date of birth",
  DEMOGRAPHIC_DOB_SPOUSE: "PIN can be derived from your partner's date of birth",
};

export function describeReason(code: ReasonCode): string {
  return REASON_MESSAGES[code];
}

/** Renders a layout such as `dd-mm-yy` as `DD MM YY`. */
export function describeLayout(layout: DatePatternLayout): string {
  return layout.split("-").join(" ").toUpperCase();
}
