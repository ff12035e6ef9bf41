import { describe, expect, it } from "vitest";

import { parseCliArgs, UsageError } from "../args";

describe("parseCliArgs", () => {
  it("reads the PIN and dates", () => {
    expect(
      parseCliArgs(["--pin", "1234", "--dob-self", "1992-08-15", "--json"]),
    ).toEqual({
      pin: "1234",
      dobSelf: "1992-08-15",
      dobSpouse: undefined,
      anniversary: undefined,
      json: true,
      explain: false,
      help: false,
    });
  });

  it("defaults to an interactive run", () => {
    expect(parseCliArgs([])).toEqual({
      json: false,
      explain: false,
      help: false,
    });
  });

  it("accepts -h", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it.each([["--nope"], ["--pin"], ["1234"]])(
    "turns parse failures for %j into UsageError",
    (arg) => {
      expect(() => parseCliArgs([arg])).toThrow(UsageError);
    },
  );
});
