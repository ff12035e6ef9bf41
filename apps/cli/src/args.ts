import { parseArgs } from "node:util";

export const USAGE = `Usage: mpin-check [options]

Classifies a 4 or 6 digit MPIN as STRONG or WEAK.
Without --pin, starts an interactive session.

Options:
  --pin <digits>             PIN to check
  --dob-self <YYYY-MM-DD>    your date of birth
  --dob-spouse <YYYY-MM-DD>  your partner's date of birth
  --anniversary <YYYY-MM-DD> your anniversary date
  --json                     print the result as JSON
  --explain                  list which rule matched
  -h, --help                 show this help
`;

export interface CliArgs {
  pin?: string;
  dobSelf?: string;
  dobSpouse?: string;
  anniversary?: string;
  json: boolean;
  explain: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isParseArgsError(error: unknown): error is TypeError & { code: string } {
  return (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS")
  );
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: {
        pin: { type: "string" },
        "dob-self": { type: "string" },
        "dob-spouse": { type: "string" },
        anniversary: { type: "string" },
        json: { type: "boolean", default: false },
        explain: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    });

    return {
      pin: values.pin,
      dobSelf: values["dob-self"],
      dobSpouse: values["dob-spouse"],
      anniversary: values.anniversary,
      json: values.json ?? false,
      explain: values.explain ?? false,
      help: values.help ?? false,
    };
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}
