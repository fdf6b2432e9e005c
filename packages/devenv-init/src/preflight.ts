/**
 * Host and project checks that run before any container is touched.
 *
 * Every problem is reported, not just the first, so a fresh checkout can be
 * fixed in one pass.
 */

import * as path from "path";
import fs from "fs-extra";
import type { CommandRunner } from "./runner.js";
import type { InitPlan } from "./plan.js";
import type { ProjectConfig } from "./project.js";
import { webPath } from "./project.js";
import { extractVersion, versionAtLeast } from "./version.js";
import { errorMessage } from "./errors.js";
import * as ui from "./ui.js";

export const WARDEN_REQUIRE = "0.2.0";
export const MUTAGEN_REQUIRE = "0.10.3";
export const MAGENTO_REPO_HOST = "repo.magento.com";
const MUTAGEN_BREW_FORMULA = "havoc-io/mutagen/mutagen";

interface HostDependency {
  name: string;
  /** Only needed where file sync goes through mutagen */
  macOnly?: boolean;
}

export const HOST_DEPENDENCIES: HostDependency[] = [
  { name: "warden" },
  { name: "mutagen", macOnly: true },
  { name: "docker-compose" },
  { name: "pv" },
];

export interface PreflightContext {
  runner: CommandRunner;
  plan: InitPlan;
  config: ProjectConfig;
  root: string;
  platform: NodeJS.Platform;
  homeDir: string;
}

export interface PreflightResult {
  ok: boolean;
  errors: string[];
  /** Installed warden version, "" when it could not be determined */
  wardenVersion: string;
}

async function toolVersion(runner: CommandRunner, tool: string): Promise<string> {
  const result = await runner.capture(tool, ["version"]);
  return result.exitCode === 0 ? extractVersion(result.stdout) : "";
}

async function installMutagen(runner: CommandRunner): Promise<void> {
  if ((await runner.exists("mutagen")) || !(await runner.exists("brew"))) return;
  ui.warning("Mutagen could not be found; attempting install via brew.");
  await runner.run("brew", ["install", MUTAGEN_BREW_FORMULA]);
}

/**
 * Seed the project's auth.json from the user's global composer credentials
 * for the Magento repository, when the project has none of its own.
 */
export async function copyGlobalCredentials(ctx: PreflightContext): Promise<boolean> {
  const authJson = webPath(ctx.config.webRoot, "auth.json");
  const target = path.resolve(ctx.root, authJson);
  const globalAuth = path.join(ctx.homeDir, ".composer", "auth.json");

  if ((await fs.pathExists(target)) || !(await fs.pathExists(globalAuth))) {
    return false;
  }

  const result = await ctx.runner.capture("docker", [
    "run", "--rm",
    "-v", `${globalAuth}:/tmp/auth.json`,
    "composer", "config", "-g", `http-basic.${MAGENTO_REPO_HOST}`,
  ]);
  if (result.exitCode !== 0) return false;

  let credentials: unknown;
  try {
    credentials = JSON.parse(result.stdout.trim());
  } catch (err) {
    ui.warning(`Could not read ${MAGENTO_REPO_HOST} credentials from ${globalAuth}: ${errorMessage(err)}`);
    return false;
  }

  ui.warning(`Configuring ${authJson} with global credentials for ${MAGENTO_REPO_HOST}`);
  await fs.outputJson(target, { "http-basic": { [MAGENTO_REPO_HOST]: credentials } });
  return true;
}

export async function runPreflight(ctx: PreflightContext): Promise<PreflightResult> {
  const { runner, plan, platform } = ctx;
  const isMac = platform === "darwin";
  const errors: string[] = [];
  const fail = (msg: string): void => {
    ui.error(msg);
    errors.push(msg);
  };

  if (isMac) {
    await installMutagen(runner);
  }

  for (const dep of HOST_DEPENDENCIES) {
    if (dep.macOnly && !isMac) continue;
    if (!(await runner.exists(dep.name))) {
      fail(`Command '${dep.name}' not found. Please install.`);
    }
  }

  const wardenVersion = await toolVersion(runner, "warden");
  if (!versionAtLeast(wardenVersion, WARDEN_REQUIRE)) {
    fail(`Warden ${WARDEN_REQUIRE} or greater is required (version ${wardenVersion || "unknown"} is installed)`);
  }

  const dockerInfo = await runner.capture("docker", ["system", "info"]);
  if (dockerInfo.exitCode !== 0) {
    fail("Docker does not appear to be running. Please start Docker.");
  }

  await copyGlobalCredentials(ctx);

  if (isMac) {
    const mutagenVersion = await toolVersion(runner, "mutagen");
    if (!versionAtLeast(mutagenVersion, MUTAGEN_REQUIRE)) {
      fail(`Mutagen ${MUTAGEN_REQUIRE} or greater is required (version ${mutagenVersion || "unknown"} is installed)`);
    }
  }

  for (const file of plan.requiredFiles) {
    if (!(await fs.pathExists(path.resolve(ctx.root, file)))) {
      fail(`Missing local file: ${file}`);
    }
  }

  return { ok: errors.length === 0, errors, wardenVersion };
}
