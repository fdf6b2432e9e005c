/**
 * In-process stand-in for CommandRunner. Records every invocation and answers
 * from canned results keyed by the rendered command line.
 */

import { CommandError } from '../errors.js';
import { formatCommand, type CaptureResult, type CommandRunner, type RunOptions } from '../runner.js';

export interface Invocation {
  command: string;
  args: string[];
}

export interface FakeRunnerOptions {
  /** Commands that `which` should not find */
  missing?: string[];
  /** Canned capture results keyed by command line */
  captures?: Record<string, Partial<CaptureResult>>;
  /** Exit statuses for `run`, keyed by command line */
  failures?: Record<string, number>;
}

export class FakeRunner implements CommandRunner {
  /** Command lines passed to run and pipeGzipInto, in order */
  readonly runs: string[] = [];
  readonly invocations: Invocation[] = [];
  readonly captured: string[] = [];
  readonly lookups: string[] = [];

  private readonly missing: Set<string>;
  private readonly captures: Record<string, Partial<CaptureResult>>;
  private readonly failures: Record<string, number>;

  constructor(options: FakeRunnerOptions = {}) {
    this.missing = new Set(options.missing ?? []);
    this.captures = options.captures ?? {};
    this.failures = options.failures ?? {};
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
    const line = formatCommand(command, args);
    this.runs.push(line);
    this.invocations.push({ command, args });
    const exitCode = this.failures[line] ?? 0;
    if (exitCode !== 0 && !options.allowFailure) {
      throw new CommandError(line, exitCode);
    }
    return exitCode;
  }

  async capture(command: string, args: string[]): Promise<CaptureResult> {
    const line = formatCommand(command, args);
    this.captured.push(line);
    const canned = this.captures[line] ?? {};
    return { exitCode: canned.exitCode ?? 0, stdout: canned.stdout ?? '', stderr: canned.stderr ?? '' };
  }

  async exists(command: string): Promise<boolean> {
    this.lookups.push(command);
    return !this.missing.has(command);
  }

  async pipeGzipInto(file: string, command: string, args: string[]): Promise<void> {
    const line = `${formatCommand('pv', [file])} | gunzip -c | ${formatCommand(command, args)}`;
    this.runs.push(line);
    const exitCode = this.failures[line] ?? 0;
    if (exitCode !== 0) {
      throw new CommandError(formatCommand(command, args), exitCode);
    }
  }
}
