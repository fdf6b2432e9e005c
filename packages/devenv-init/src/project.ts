/**
 * Project root discovery and `.env` configuration.
 *
 * The `.env` file is the same one Warden reads for the environment, so the
 * keys are Warden's own (WARDEN_WEB_ROOT, TRAEFIK_DOMAIN, ...).
 */

import * as path from "path";
import fs from "fs-extra";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const ENV_FILE = ".env";
export const DEFAULT_DB_DUMP = "./backfill/magento-db.sql.gz";

export type EnvMap = Record<string, string | undefined>;

export interface ProjectConfig {
  /** Web root relative to the project root, always starting with "./" when it was absolute */
  webRoot: string;
  traefikDomain: string;
  traefikSubdomain: string;
  dbDump: string;
  frontUrl: string;
  adminUrl: string;
}

export function findProjectRoot(start: string = process.cwd()): string {
  let dir = path.resolve(start);
  while (true) {
    if (fs.existsSync(path.join(dir, ENV_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(start);
}

/** Values in `.env` take precedence over the process environment. */
export async function loadProjectEnv(root: string, processEnv: EnvMap = process.env): Promise<EnvMap> {
  const envPath = path.join(root, ENV_FILE);
  if (!(await fs.pathExists(envPath))) {
    throw new ConfigError(`Missing ${ENV_FILE} file in ${root}`);
  }
  const parsed = parseDotenv(await fs.readFile(envPath, "utf-8"));
  return { ...processEnv, ...parsed };
}

const requiredString = z
  .string({ required_error: "is required" })
  .trim()
  .min(1, "must not be empty");

const envSchema = z.object({
  WARDEN_WEB_ROOT: z.string().optional(),
  TRAEFIK_DOMAIN: requiredString,
  TRAEFIK_SUBDOMAIN: requiredString,
  DB_DUMP: z.string().optional(),
});

export function normalizeWebRoot(webRoot: string | undefined): string {
  return (webRoot || "/").replace(/^\//, "./");
}

/** Joins a path below the web root the way it is shown to the user, e.g. "./app/etc/env.php". */
export function webPath(webRoot: string, relative: string): string {
  return `${webRoot.replace(/\/+$/, "")}/${relative}`;
}

export function resolveProjectConfig(env: EnvMap): ProjectConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new ConfigError(`Invalid ${ENV_FILE} configuration: ${problems.join("; ")}`);
  }

  const values = result.data;
  const host = `${values.TRAEFIK_SUBDOMAIN}.${values.TRAEFIK_DOMAIN}`;

  return {
    webRoot: normalizeWebRoot(values.WARDEN_WEB_ROOT),
    traefikDomain: values.TRAEFIK_DOMAIN,
    traefikSubdomain: values.TRAEFIK_SUBDOMAIN,
    dbDump: values.DB_DUMP || DEFAULT_DB_DUMP,
    frontUrl: `https://${host}/`,
    adminUrl: `https://${host}/backend/`,
  };
}
