import * as os from "os";
import * as path from "path";
import { Command, InvalidArgumentError } from "commander";
import { CommandError, PreflightError, errorMessage } from "./errors.js";
import { findProjectRoot, loadProjectEnv, resolveProjectConfig, type EnvMap } from "./project.js";
import { DEFAULT_META_PACKAGE, resolvePlan } from "./plan.js";
import { runPreflight } from "./preflight.js";
import { runInstall } from "./installer.js";
import { ProcessRunner, type CommandRunner, type ProcessRunnerOptions } from "./runner.js";
import { printInstallInfo, type InstallInfo } from "./summary.js";
import { isValidMetaVersion } from "./version.js";
import * as ui from "./ui.js";

export interface CliOptions {
  cleanInstall?: boolean;
  metaPackage: string;
  metaVersion?: string;
  skipDbImport?: boolean;
  dbDump?: string;
  projectDir?: string;
  verbose?: boolean;
}

export interface CliDependencies {
  createRunner?: (options: ProcessRunnerOptions) => CommandRunner;
  platform?: NodeJS.Platform;
  homeDir?: string;
  env?: EnvMap;
  clock?: () => Date;
}

export function parseMetaVersion(value: string): string {
  if (!isValidMetaVersion(value)) {
    throw new InvalidArgumentError(
      `Invalid --meta-version=${value} specified (valid values are 2.3.4 or later and 2.[3-9].x)`
    );
  }
  return value;
}

export async function runInit(options: CliOptions, deps: CliDependencies = {}): Promise<InstallInfo> {
  const root = options.projectDir ? path.resolve(options.projectDir) : findProjectRoot();
  const platform = deps.platform ?? process.platform;
  const homeDir = deps.homeDir ?? os.homedir();
  const runnerOptions: ProcessRunnerOptions = { cwd: root, verbose: options.verbose };
  const runner = deps.createRunner ? deps.createRunner(runnerOptions) : new ProcessRunner(runnerOptions);

  const config = resolveProjectConfig(await loadProjectEnv(root, deps.env));
  const plan = await resolvePlan(
    {
      cleanInstall: options.cleanInstall ?? false,
      skipDbImport: options.skipDbImport ?? false,
      metaPackage: options.metaPackage,
      metaVersion: options.metaVersion,
      dbDump: options.dbDump,
    },
    config,
    root
  );
  for (const warning of plan.warnings) {
    ui.warning(warning);
  }

  ui.section("Verifying configuration", deps.clock ? deps.clock() : new Date());
  const preflight = await runPreflight({ runner, plan, config, root, platform, homeDir });
  if (!preflight.ok) {
    throw new PreflightError(preflight.errors);
  }

  const info = await runInstall({
    runner,
    plan,
    config,
    platform,
    homeDir,
    wardenVersion: preflight.wardenVersion,
    clock: deps.clock,
  });
  printInstallInfo(info);
  return info;
}

/** Print a failure and return the process exit status it maps to. */
export function reportError(err: unknown): number {
  if (err instanceof PreflightError) {
    // each problem was printed as it was found
    return 1;
  }
  ui.error(errorMessage(err));
  return err instanceof CommandError ? err.exitCode : 1;
}

export function buildProgram(version: string, deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name("devenv-init")
    .description("Bootstrap the local Warden development environment for this Magento 2 project")
    .version(version)
    .option(
      "--clean-install",
      "install from scratch rather than use existing database dump; implied when no composer.json file is present in web root"
    )
    .option(
      "--meta-package <name>",
      "passed to 'composer create-project' when --clean-install is specified",
      DEFAULT_META_PACKAGE
    )
    .option(
      "--meta-version <version>",
      "alternate version to install; defaults to latest; may be (for example) specified as 2.3.x (latest minor) or 2.3.4",
      parseMetaVersion
    )
    .option("--skip-db-import", "skips over db import (assume db has already been imported)")
    .option("--db-dump <file>", "path to .sql.gz file for import during init")
    .option("--project-dir <dir>", "project root containing .env (default: nearest parent directory with a .env)")
    .option("--verbose", "print every external command before it runs")
    .allowExcessArguments(false)
    .action(async (options: CliOptions) => {
      await runInit(options, deps);
    });

  return program;
}
