// src/lib/errors.ts

export interface CliError extends Error {
  exitCode?: number;
  details?: Record<string, unknown>;
}

export class CsvFormatError extends Error implements CliError {
  exitCode = 2;
  details: Record<string, unknown>;

  constructor(message: string, row: number) {
    super(`Row ${row}: ${message}`);
    this.name = "CsvFormatError";
    this.details = { row };
  }
}

export class InputClosedError extends Error implements CliError {
  exitCode = 130;

  constructor() {
    super("Input ended before all values were entered");
    this.name = "InputClosedError";
  }
}

export class UsageError extends Error implements CliError {
  exitCode = 1;

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Prints the failure and returns the exit code the process should end with. */
export function handleFatal(err: unknown): number {
  if (!(err instanceof Error)) {
    console.error("[ERROR]", err);
    return 1;
  }

  const cliErr: CliError = err;
  console.error(`[ERROR] ${cliErr.message}`);
  if (cliErr.details) console.error(cliErr.details);
  if (process.env.NODE_ENV === "development") console.error(cliErr.stack);

  return cliErr.exitCode ?? 1;
}
