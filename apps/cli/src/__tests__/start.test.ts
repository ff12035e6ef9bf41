import { describe, expect, it } from "vitest";

import { startCli } from "../start";
import { ScriptedPrompter } from "../test/scripted-prompter";

function createIO() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: { write: (chunk: string) => out.push(chunk) },
      stderr: { write: (chunk: string) => err.push(chunk) },
      createPrompter: () => new ScriptedPrompter([]),
    },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

describe("startCli", () => {
  it("prints only the message for a bad environment", async () => {
    const h = createIO();
    const code = await startCli(["--pin", "1234"], h.io, {
      LOG_LEVEL: "loud",
    });

    expect(code).toBe(2);
    expect(h.stdout()).toBe("");
    expect(h.stderr()).toMatch(/^Invalid environment configuration:\n/);
    expect(h.stderr()).toContain("LOG_LEVEL");
    expect(h.stderr()).not.toContain("EnvError");
    expect(h.stderr()).not.toMatch(/\n\s+at /);
  });

  it("runs the CLI with the loaded settings", async () => {
    const h = createIO();
    const code = await startCli(["--pin", "1234"], h.io, {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      MPIN_OUTPUT: "json",
    });

    expect(code).toBe(0);
    expect(h.stdout()).toBe(
      '{"strength":"WEAK","reasons":["COMMONLY_USED"]}\n',
    );
    expect(h.stderr()).toBe("");
  });
});
