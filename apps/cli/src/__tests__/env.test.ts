import { describe, expect, it } from "vitest";

import { EnvError, loadEnv } from "../env";

describe("loadEnv", () => {
  it("applies development defaults", () => {
    expect(loadEnv({})).toEqual({
      nodeEnv: "development",
      logLevel: "debug",
      outputFormat: "text",
    });
  });

  it("logs at info outside development", () => {
    expect(loadEnv({ NODE_ENV: "production" }).logLevel).toBe("info");
    expect(loadEnv({ NODE_ENV: "test" }).logLevel).toBe("info");
  });

  it("reads explicit settings", () => {
    expect(
      loadEnv({ NODE_ENV: "test", LOG_LEVEL: "warn", MPIN_OUTPUT: "json" }),
    ).toEqual({
      nodeEnv: "test",
      logLevel: "warn",
      outputFormat: "json",
    });
  });

  it("treats empty variables as unset", () => {
    expect(
      loadEnv({ NODE_ENV: "production", LOG_LEVEL: "", MPIN_OUTPUT: "" }),
    ).toEqual({
      nodeEnv: "production",
      logLevel: "info",
      outputFormat: "text",
    });
  });

  it("rejects unknown values", () => {
    expect(() => loadEnv({ MPIN_OUTPUT: "xml" })).toThrow(EnvError);
    expect(() => loadEnv({ LOG_LEVEL: "verbose" })).toThrow(
      /^Invalid environment configuration:/,
    );
  });
});
