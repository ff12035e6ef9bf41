import { describe, expect, it } from "vitest";

import { describeLayout, describeReason } from "../reason-messages";
import { REASON_CODES } from "../types";

describe("reason-messages", () => {
  it("describes every reason code", () => {
    for (const code of REASON_CODES) {
      expect(describeReason(code)).not.toBe("");
    }
    expect(describeReason("DEMOGRAPHIC_DOB_SPOUSE")).toBe(
      "PIN can be derived from your partner's date of birth",
    );
  });

  it("renders layouts for display", () => {
    expect(describeLayout("dd-mm-yy")).toBe("DD MM YY");
    expect(describeLayout("yyyy")).toBe("YYYY");
  });

  it("lists reason codes in sorted order", () => {
    expect([...REASON_CODES]).toEqual([...REASON_CODES].sort());
  });
});
