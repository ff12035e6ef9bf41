import { createInterface } from "node:readline/promises";

export interface Prompter {
  /** Resolves to `undefined` once input has ended. */
  question(query: string): Promise<string | undefined>;
  close(): void;
}

/**
 * Reads answers line by line from `input`. Lines that arrive before their
 * question is asked (piped input) are queued, not dropped.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Prompter {
  const rl = createInterface({ input, output });
  // Created up front so no line is emitted before something listens.
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;
  let inputClosed = false;
  rl.once("close", () => {
    inputClosed = true;
  });

  return {
    async question(query) {
      if (ended) {
        return;
      }
      // Queued lines may outlive the interface; prompt through the stream then.
      if (inputClosed) {
        output.write(query);
      } else {
        rl.setPrompt(query);
        rl.prompt();
      }
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return;
      }
      return next.value;
    },
    close() {
      ended = true;
      rl.close();
    },
  };
}
