import { randomUUID } from "node:crypto";

import {
  type CalendarDate,
  calendarDateSchema,
  type DemographicRole,
  type Demographics,
  explainPin,
  InvalidCalendarDateError,
  InvalidPinError,
  parseClassifyRequest,
  pinSchema,
} from "@mpin-check/policy";
import { ZodError } from "zod";

import { type CliArgs, parseCliArgs, USAGE, UsageError } from "./args";
import { type CliEnv, loadEnv } from "./env";
import {
  createSessionLogger,
  extractErrorContext,
  extractInputMeta,
  isDebugEnabled,
  type Logger,
  logError,
  logWarn,
} from "./logging";
import type { Prompter } from "./prompt";
import { type RenderOptions, renderExplanation } from "./render";

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: OutputSink;
  stderr: OutputSink;
  createPrompter: () => Prompter;
}

export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_INVALID_INPUT = 2;

type RunMode = "one-shot" | "interactive";

const INPUT_ENDED = Symbol("input-ended");

const FLAG_NAMES: Record<string, string> = {
  pin: "--pin",
  dob_self: "--dob-self",
  dob_spouse: "--dob-spouse",
  anniversary: "--anniversary",
};

const DATE_PROMPTS: ReadonlyArray<readonly [DemographicRole, string]> = [
  ["dob_self", "Your date of birth (YYYY-MM-DD, blank to skip): "],
  ["dob_spouse", "Partner's date of birth (YYYY-MM-DD, blank to skip): "],
  ["anniversary", "Anniversary date (YYYY-MM-DD, blank to skip): "],
];

function formatIssue(issue: ZodError["issues"][number]): string {
  const key = issue.path.at(-1);
  if (key === undefined) {
    return issue.message;
  }
  const flag = FLAG_NAMES[String(key)] ?? String(key);
  return `${flag}: ${issue.message}`;
}

function firstIssueMessage(error: ZodError): string {
  return error.issues[0]?.message ?? "Invalid input";
}

function isExpectedFailure(error: unknown): error is Error {
  return (
    error instanceof UsageError ||
    error instanceof ZodError ||
    error instanceof InvalidPinError ||
    error instanceof InvalidCalendarDateError
  );
}

function describeFailure(error: Error): string {
  if (error instanceof ZodError) {
    return error.issues.map(formatIssue).join("; ");
  }
  return error.message;
}

async function askPin(
  prompter: Prompter,
  io: CliIO,
  log: Logger,
): Promise<string | typeof INPUT_ENDED> {
  for (;;) {
    const answer = await prompter.question("Enter MPIN (4 or 6 digits): ");
    if (answer === undefined) {
      return INPUT_ENDED;
    }
    const parsed = pinSchema.safeParse(answer.trim());
    if (parsed.success) {
      return parsed.data;
    }
    io.stderr.write(`Error: ${firstIssueMessage(parsed.error)}\n`);
    logWarn("Rejected PIN entry", extractErrorContext(parsed.error), log);
  }
}

async function askDate(
  prompter: Prompter,
  query: string,
  io: CliIO,
  log: Logger,
): Promise<CalendarDate | undefined | typeof INPUT_ENDED> {
  for (;;) {
    const answer = await prompter.question(query);
    if (answer === undefined) {
      return INPUT_ENDED;
    }
    const text = answer.trim();
    if (!text) {
      return;
    }
    const parsed = calendarDateSchema.safeParse(text);
    if (parsed.success) {
      return parsed.data;
    }
    io.stderr.write(`Error: ${firstIssueMessage(parsed.error)}\n`);
    logWarn("Rejected date entry", extractErrorContext(parsed.error), log);
  }
}

async function runInteractive(
  io: CliIO,
  render: RenderOptions,
  log: Logger,
): Promise<number> {
  const prompter = io.createPrompter();
  io.stdout.write("MPIN strength check. End input (Ctrl+D) to quit.\n");

  try {
    for (;;) {
      const pin = await askPin(prompter, io, log);
      if (pin === INPUT_ENDED) {
        return EXIT_OK;
      }

      const demographics: { -readonly [R in DemographicRole]?: CalendarDate } =
        {};
      for (const [role, query] of DATE_PROMPTS) {
        const date = await askDate(prompter, query, io, log);
        if (date === INPUT_ENDED) {
          return EXIT_OK;
        }
        if (date) {
          demographics[role] = date;
        }
      }

      classifyAndPrint(pin, demographics, io, render, log);

      const again = await prompter.question("Check another PIN? (y/N): ");
      if (again === undefined || !/^y(es)?$/i.test(again.trim())) {
        return EXIT_OK;
      }
    }
  } finally {
    prompter.close();
  }
}

function classifyAndPrint(
  pin: string,
  demographics: Demographics,
  io: CliIO,
  render: RenderOptions,
  log: Logger,
): void {
  if (isDebugEnabled()) {
    log.debug(extractInputMeta(demographics), "Classifying PIN");
  }
  const explanation = explainPin(pin, demographics);
  log.info(
    {
      strength: explanation.result.strength,
      reasons: explanation.result.reasons,
    },
    "PIN classified",
  );
  io.stdout.write(renderExplanation(explanation, render));
}

function runOneShot(
  args: CliArgs & { pin: string },
  io: CliIO,
  render: RenderOptions,
  log: Logger,
): number {
  const request = parseClassifyRequest({
    pin: args.pin,
    demographics: {
      dob_self: args.dobSelf,
      dob_spouse: args.dobSpouse,
      anniversary: args.anniversary,
    },
  });
  classifyAndPrint(request.pin, request.demographics, io, render, log);
  return EXIT_OK;
}

/**
 * Runs the CLI and resolves to its exit code: 0 when a verdict was printed
 * (or the session ended), 2 for rejected input, 1 for anything unexpected.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO,
  env: CliEnv = loadEnv(),
): Promise<number> {
  const sessionId = randomUUID();
  const log = createSessionLogger(sessionId);
  let mode: RunMode = "one-shot";

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return EXIT_OK;
    }

    const render: RenderOptions = {
      format: args.json ? "json" : env.outputFormat,
      explain: args.explain,
    };

    const { pin } = args;
    if (pin === undefined) {
      mode = "interactive";
      return await runInteractive(io, render, log);
    }
    return runOneShot({ ...args, pin }, io, render, log);
  } catch (error) {
    if (isExpectedFailure(error)) {
      io.stderr.write(`Error: ${describeFailure(error)}\n`);
      if (error instanceof UsageError) {
        io.stderr.write("Run mpin-check --help for usage.\n");
      }
      logWarn(
        "Rejected input",
        { ...extractErrorContext(error), mode },
        log,
      );
      return EXIT_INVALID_INPUT;
    }

    const fingerprint = logError(
      error,
      { sessionId, operation: "cli.run", mode },
      log,
    );
    io.stderr.write(`Unexpected error (ref ${fingerprint})\n`);
    return EXIT_UNEXPECTED;
  }
}
