import * as readline from "readline";

export class EndOfInputError extends Error {
  constructor() {
    super("input closed");
    this.name = "EndOfInputError";
  }
}

export interface Prompter {
  /**
   * Asks one question. An empty answer yields `defaultValue` when given.
   * Rejects with EndOfInputError once input is closed.
   */
  ask(question: string, defaultValue?: string): Promise<string>;
  close(): void;
}

export interface Terminal {
  write(line?: string): void;
  clear(): void;
  readonly width: number;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  ask(question: string, defaultValue?: string): Promise<string> {
    if (this.closed) return Promise.reject(new EndOfInputError());

    const suffix = defaultValue !== undefined && defaultValue !== "" ? ` [${defaultValue}]` : "";
    return new Promise<string>((resolve, reject) => {
      const onClose = () => reject(new EndOfInputError());
      this.rl.once("close", onClose);
      this.rl.question(`${question}${suffix}: `, (answer) => {
        this.rl.off("close", onClose);
        const trimmed = answer.trim();
        resolve(trimmed === "" && defaultValue !== undefined ? defaultValue : trimmed);
      });
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

export class StdoutTerminal implements Terminal {
  write(line = ""): void {
    process.stdout.write(`${line}\n`);
  }

  clear(): void {
    if (process.stdout.isTTY) process.stdout.write("\x1b[2J\x1b[H");
  }

  get width(): number {
    return process.stdout.columns ?? 100;
  }
}
