/**
 * External command execution.
 *
 * Everything the installer does happens by running other programs (warden,
 * docker, pv, which). The CommandRunner interface is the only seam between
 * the step sequence and the host, so tests swap in a recording fake.
 */

import { spawn, type SpawnOptions } from "child_process";
import type { Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import { createGunzip } from "zlib";
import { CommandError } from "./errors.js";
import * as ui from "./ui.js";

/** Exit status reported when a program cannot be started at all, as a shell would. */
export const NOT_FOUND_EXIT_CODE = 127;

const GUNZIP_LINE = "gunzip -c";

export interface RunOptions {
  /** Resolve with the exit status instead of rejecting on failure. */
  allowFailure?: boolean;
}

export interface CaptureResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run with inherited stdio. Rejects with CommandError on a non-zero status unless allowFailure is set. */
  run(command: string, args: string[], options?: RunOptions): Promise<number>;
  /** Run with captured output. Never rejects on a non-zero status. */
  capture(command: string, args: string[]): Promise<CaptureResult>;
  exists(command: string): Promise<boolean>;
  /** `pv <file> | gunzip -c | <command> <args>` */
  pipeGzipInto(file: string, command: string, args: string[]): Promise<void>;
}

export interface SpawnedProcess {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

const SAFE_ARG = /^[\w@%+=:,./~-]+$/;

function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/** Render a command line the way it would be typed into a POSIX shell. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(" ");
}

function waitForExit(child: SpawnedProcess): Promise<number> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (code: number): void => {
      if (settled) return;
      settled = true;
      resolve(code);
    };
    child.on("error", () => settle(NOT_FOUND_EXIT_CODE));
    child.on("close", (code) => settle(code ?? 1));
  });
}

function collect(stream: Readable | null): Promise<string> {
  if (!stream) return Promise.resolve("");
  return new Promise((resolve, reject) => {
    let data = "";
    stream.setEncoding("utf-8");
    stream.on("data", (chunk: string) => {
      data += chunk;
    });
    stream.on("end", () => resolve(data));
    stream.on("error", reject);
  });
}

export interface ProcessRunnerOptions {
  cwd: string;
  /** Echo each command line before it runs */
  verbose?: boolean;
  /** Custom process spawner (for testing) */
  spawnFn?: SpawnFn;
}

export class ProcessRunner implements CommandRunner {
  private readonly cwd: string;
  private readonly verbose: boolean;
  private readonly spawn: SpawnFn;

  constructor(options: ProcessRunnerOptions) {
    this.cwd = options.cwd;
    this.verbose = options.verbose ?? false;
    this.spawn = options.spawnFn ?? spawn;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
    const line = formatCommand(command, args);
    if (this.verbose) ui.command(line);

    const child = this.spawn(command, args, { cwd: this.cwd, stdio: "inherit" });
    const exitCode = await waitForExit(child);
    if (exitCode !== 0 && !options.allowFailure) {
      throw new CommandError(line, exitCode);
    }
    return exitCode;
  }

  async capture(command: string, args: string[]): Promise<CaptureResult> {
    if (this.verbose) ui.command(formatCommand(command, args));

    const child = this.spawn(command, args, { cwd: this.cwd, stdio: ["ignore", "pipe", "pipe"] });
    const [exitCode, stdout, stderr] = await Promise.all([
      waitForExit(child),
      collect(child.stdout),
      collect(child.stderr),
    ]);
    return { exitCode, stdout, stderr };
  }

  async exists(command: string): Promise<boolean> {
    const result = await this.capture("which", [command]);
    return result.exitCode === 0 && result.stdout.trim() !== "";
  }

  async pipeGzipInto(file: string, command: string, args: string[]): Promise<void> {
    const pvLine = formatCommand("pv", [file]);
    const targetLine = formatCommand(command, args);
    if (this.verbose) ui.command(`${pvLine} | ${GUNZIP_LINE} | ${targetLine}`);

    // pv draws its progress bar on stderr, so that stays on the terminal
    const source = this.spawn("pv", [file], { cwd: this.cwd, stdio: ["ignore", "pipe", "inherit"] });
    const target = this.spawn(command, args, { cwd: this.cwd, stdio: ["pipe", "inherit", "inherit"] });
    if (!source.stdout || !target.stdin) {
      throw new Error(`Could not open pipe between ${pvLine} and ${targetLine}`);
    }

    let streamed = 0;
    source.stdout.on("data", (chunk: Buffer) => {
      streamed += chunk.length;
    });

    // a stream error is reported through whichever stage caused it, once both processes are gone
    const [pipeFailed, sourceExit, targetExit] = await Promise.all([
      pipeline(source.stdout, createGunzip(), target.stdin).then(
        () => false,
        () => true
      ),
      waitForExit(source),
      waitForExit(target),
    ]);

    if (targetExit !== 0) throw new CommandError(targetLine, targetExit);
    // pv is cut off by a broken pipe when gunzip rejects what it already sent
    if (sourceExit !== 0 && !(pipeFailed && streamed > 0)) throw new CommandError(pvLine, sourceExit);
    if (pipeFailed) throw new CommandError(GUNZIP_LINE, 1);
  }
}
