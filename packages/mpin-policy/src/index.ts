export {
  assertValidCalendarDate,
  daysInMonth,
  formatCalendarDate,
  isValidCalendarDate,
  parseCalendarDate,
  tryParseCalendarDate,
} from "./calendar-date";
export {
  assertValidPin,
  classifyPin,
  explainPin,
  getPinRequirementStatus,
  isValidPin,
} from "./classify";
export { getCommonPins, isCommonPin } from "./common-pins";
export { generateDatePatterns, listDatePatterns } from "./date-patterns";
export {
  getInvalidPinMessage,
  InvalidCalendarDateError,
  InvalidPinError,
  type InvalidPinIssue,
} from "./errors";
export { describeLayout, describeReason } from "./reason-messages";
export {
  type ClassifyRequest,
  type ClassifyRequestInput,
  calendarDateSchema,
  classifyRequestSchema,
  demographicsInputSchema,
  parseClassifyRequest,
  pinSchema,
} from "./schemas";
export {
  type CalendarDate,
  type ClassificationResult,
  DEMOGRAPHIC_ROLES,
  type DatePattern,
  type DatePatternLayout,
  type DemographicRole,
  type Demographics,
  PIN_LENGTHS,
  type Pin,
  type PinExplanation,
  type PinLength,
  type PinMatch,
  type PinRequirementStatus,
  type PinStrength,
  REASON_CODES,
  type ReasonCode,
} from "./types";
