// CHANGE: Supply confirmation answers from a canned value or the controlling terminal.
// WHY: Prompting without a terminal would hang an unattended install.

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/**
 * Source of yes/no answers for the decision mediator.
 */
export interface Prompter {
  /** False when asking would block with nobody to answer. */
  readonly available: boolean;
  ask(question: string): Promise<string>;
}

/**
 * Fixed answer, no I/O. Used for non-interactive runs and tests.
 */
export class CannedPrompter implements Prompter {
  readonly available = true;

  constructor(readonly answer: string) {}

  async ask(): Promise<string> {
    return this.answer;
  }
}

/**
 * Prompter that can never ask, for `--no-input` runs.
 */
export class DisabledPrompter implements Prompter {
  readonly available = false;

  async ask(): Promise<string> {
    throw new Error("prompting is disabled");
  }
}

type TerminalInput = Readable & { readonly isTTY?: boolean };
type TerminalOutput = Writable & { readonly isTTY?: boolean };

/**
 * Reads an answer line from the controlling terminal.
 */
export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout
  ) {}

  get available(): boolean {
    return Boolean(this.input.isTTY && this.output.isTTY);
  }

  ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    return new Promise(resolve => {
      // End of input counts as an empty answer.
      rl.once("close", () => resolve(""));
      rl.question(question, answer => {
        resolve(answer);
        rl.close();
      });
    });
  }
}

/**
 * Pick the prompter for a run: a canned answer wins, then `--no-input`, then the terminal.
 */
export function createPrompter(options: { readonly cannedAnswer?: string; readonly noInput?: boolean }): Prompter {
  if (options.cannedAnswer !== undefined) {
    return new CannedPrompter(options.cannedAnswer);
  }
  if (options.noInput) {
    return new DisabledPrompter();
  }
  return new TerminalPrompter();
}
