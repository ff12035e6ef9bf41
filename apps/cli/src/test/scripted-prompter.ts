import type { Prompter } from "../prompt";

/**
 * Answers prompts from a fixed script; resolves `undefined` (end of input)
 * once the script runs out.
 */
export class ScriptedPrompter implements Prompter {
  readonly queries: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  async question(query: string): Promise<string | undefined> {
    this.queries.push(query);
    return this.answers.shift();
  }

  close(): void {
    this.closed = true;
  }
}
