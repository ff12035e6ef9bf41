import pino, { type Logger } from "pino";

import type { CliEnv } from "../env";
import { buildLoggerOptions } from "../logging/logger";

const TEST_ENV: CliEnv = {
  nodeEnv: "test",
  logLevel: "debug",
  outputFormat: "text",
};

export interface CapturedLogger {
  log: Logger;
  /** Parsed JSON lines written so far */
  entries(): Record<string, unknown>[];
}

/**
 * A logger with the production options that writes into memory.
 */
export function createCapturingLogger(): CapturedLogger {
  const lines: string[] = [];
  const log = pino(buildLoggerOptions(TEST_ENV), {
    write(chunk: string) {
      lines.push(chunk);
    },
  });

  return {
    log,
    entries: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        if (!parsed || typeof parsed !== "object") {
          throw new Error("Expected a JSON object log line");
        }
        return { ...parsed };
      }),
  };
}
