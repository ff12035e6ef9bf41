import { z } from "zod";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type OutputFormat = "text" | "json";

// Unset and empty variables are treated alike.
const blankAsUndefined = (value: unknown) =>
  value === "" ? undefined : value;

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    blankAsUndefined,
    z.enum(["development", "production", "test"]).default("development"),
  ),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).optional()),
  MPIN_OUTPUT: z.preprocess(
    blankAsUndefined,
    z.enum(["text", "json"]).default("text"),
  ),
});

export interface CliEnv {
  nodeEnv: "development" | "production" | "test";
  logLevel: LogLevel;
  outputFormat: OutputFormat;
}

export class EnvError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EnvError";
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new EnvError(
      `Invalid environment configuration:\n${z.prettifyError(result.error)}`,
    );
  }

  const { NODE_ENV, LOG_LEVEL, MPIN_OUTPUT } = result.data;
  return {
    nodeEnv: NODE_ENV,
    logLevel: LOG_LEVEL ?? (NODE_ENV === "development" ? "debug" : "info"),
    outputFormat: MPIN_OUTPUT,
  };
}
