/** Raised for a missing or malformed project `.env`. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * An external command exited with a non-zero status.
 * `command` is the joined command line as it would be typed in a shell.
 */
export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number;

  constructor(command: string, exitCode: number) {
    super(`Command \`${command}\` failed with exit code ${exitCode}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
  }
}

/** Raised when preflight checks fail; the individual problems were already reported. */
export class PreflightError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`${problems.length} preflight check${problems.length !== 1 ? "s" : ""} failed`);
    this.name = "PreflightError";
    this.problems = problems;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
