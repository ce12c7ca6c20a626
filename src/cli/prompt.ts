// Typed questions on top of a Prompter. Invalid answers are re-asked.

import type { Prompter, Terminal } from "./terminal";

const MAX_ATTEMPTS = 5;

export class TooManyInvalidAnswersError extends Error {
  constructor(question: string) {
    super(`No valid answer to "${question}"`);
    this.name = "TooManyInvalidAnswersError";
  }
}

export interface NumberOptions {
  defaultValue?: number;
  min?: number;
  // exclusive lower bound
  greaterThan?: number;
  integer?: boolean;
}

export async function askText(p: Prompter, question: string, defaultValue?: string): Promise<string> {
  return p.ask(question, defaultValue);
}

export async function askNumber(
  p: Prompter,
  out: Terminal,
  question: string,
  opts: NumberOptions = {}
): Promise<number> {
  const def = opts.defaultValue !== undefined ? String(opts.defaultValue) : undefined;

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const answer = await p.ask(question, def);
    const value = Number(answer);

    if (answer === "" || !Number.isFinite(value)) {
      out.write("Please enter a number.");
    } else if (opts.integer && !Number.isInteger(value)) {
      out.write("Please enter a whole number.");
    } else if (opts.min !== undefined && value < opts.min) {
      out.write(`Please enter a value of at least ${opts.min}.`);
    } else if (opts.greaterThan !== undefined && value <= opts.greaterThan) {
      out.write(`Please enter a value greater than ${opts.greaterThan}.`);
    } else {
      return value;
    }
  }
  throw new TooManyInvalidAnswersError(question);
}

export async function askChoice<T extends string>(
  p: Prompter,
  out: Terminal,
  question: string,
  choices: readonly T[],
  defaultValue?: T
): Promise<T> {
  const listed = `${question} (${choices.join("/")})`;

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const answer = await p.ask(listed, defaultValue);
    const match =
      choices.find((c) => c === answer) ?? choices.find((c) => c.toLowerCase() === answer.toLowerCase());
    if (match !== undefined) return match;
    out.write(`Please choose one of: ${choices.join(", ")}`);
  }
  throw new TooManyInvalidAnswersError(question);
}

export async function askConfirm(p: Prompter, out: Terminal, question: string, defaultYes = true): Promise<boolean> {
  const answer = await askChoice(p, out, question, ["y", "n"] as const, defaultYes ? "y" : "n");
  return answer === "y";
}

/**
 * Numbered pick from a list; 0 means cancel when `allowCancel` is set.
 * Returns the zero-based index, or null on cancel.
 */
export async function askIndex(
  p: Prompter,
  out: Terminal,
  question: string,
  count: number,
  opts: { allowCancel?: boolean; defaultValue?: number } = {}
): Promise<number | null> {
  const min = opts.allowCancel ? 0 : 1;
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const n = await askNumber(p, out, question, { defaultValue: opts.defaultValue, integer: true, min });
    if (n <= count) return n === 0 ? null : n - 1;
    out.write(`Please enter a number from ${min} to ${count}.`);
  }
  throw new TooManyInvalidAnswersError(question);
}
