import { type CliEnv, EnvError, loadEnv } from "./env";
import type { CliIO } from "./run";

const EXIT_BAD_CONFIG = 2;

/**
 * Validates the environment, then loads and runs the CLI. The logging
 * module reads the environment on import, so nothing that logs may load
 * before this check passes.
 */
export async function startCli(
  argv: readonly string[],
  io: CliIO,
  source: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let env: CliEnv;
  try {
    env = loadEnv(source);
  } catch (error) {
    if (error instanceof EnvError) {
      io.stderr.write(`${error.message}\n`);
      return EXIT_BAD_CONFIG;
    }
    throw error;
  }

  const { runCli } = await import("./run");
  return runCli(argv, io, env);
}
