import { createReadlinePrompter } from "./prompt";
import { startCli } from "./start";

process.exitCode = await startCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  createPrompter: () => createReadlinePrompter(process.stdin, process.stdout),
});
