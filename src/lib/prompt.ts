// src/lib/prompt.ts
import readline from "readline";
import { InputClosedError } from "./errors";
import { ValidationResult } from "../helpers/validation";

export interface LineReader {
  question(prompt: string): Promise<string>;
}

export interface ConsoleReader extends LineReader {
  close(): void;
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * Line reader over a stream. Lines that arrive before they are asked for
 * (piped input) are queued rather than dropped.
 */
export function createConsoleReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleReader {
  const rl = readline.createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: Waiter[] = [];
  let closed = false;

  rl.on("line", (line) => {
    const waiter = waiting.shift();
    if (waiter) waiter.resolve(line);
    else queued.push(line);
  });

  rl.on("close", () => {
    closed = true;
    for (const waiter of waiting.splice(0)) waiter.reject(new InputClosedError());
  });

  return {
    question(prompt) {
      output.write(prompt);
      const line = queued.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.reject(new InputClosedError());
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },
    close: () => rl.close(),
  };
}

/** Re-asks until `validate` accepts the answer, printing each rejection. */
export async function askUntilValid<T>(
  reader: LineReader,
  prompt: string,
  validate: (raw: string) => ValidationResult<T>
): Promise<T> {
  for (;;) {
    const result = validate(await reader.question(prompt));
    if (result.ok) return result.value;
    console.log(result.error);
  }
}
