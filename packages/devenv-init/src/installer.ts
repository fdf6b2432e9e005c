/**
 * The init sequence: bring Warden and the project environment up, get the
 * code and database in place, then hand back login details.
 *
 * Commands run strictly in order and the first failure aborts the run.
 * Application commands go through `warden env exec -T php-fpm`.
 */

import * as path from "path";
import fs from "fs-extra";
import type { CommandRunner } from "./runner.js";
import { formatCommand } from "./runner.js";
import type { InitPlan } from "./plan.js";
import type { ProjectConfig } from "./project.js";
import type { InstallInfo } from "./summary.js";
import { CommandError } from "./errors.js";
import { versionBelow } from "./version.js";
import * as ui from "./ui.js";

export const ADMIN_USER = "localadmin";
/** Warden releases before this one do not start mutagen sync on their own */
export const WARDEN_AUTO_SYNC_VERSION = "0.3.0";
export const CREATE_PROJECT_DIR = "/tmp/create-project";
export const APP_DIR = "/var/www/html";
const DB_NAME = "magento";

const WAIT_FOR_DB = "while ! nc -z db 3306 </dev/null; do sleep 2; done";

export const SETUP_INSTALL_ARGS = [
  "--cleanup-database",
  "--backend-frontname=backend",
  "--amqp-host=rabbitmq",
  "--amqp-port=5672",
  "--amqp-user=guest",
  "--amqp-password=guest",
  "--consumers-wait-for-messages=0",
  "--db-host=db",
  `--db-name=${DB_NAME}`,
  "--db-user=magento",
  "--db-password=magento",
  "--http-cache-hosts=varnish:80",
  "--session-save=redis",
  "--session-save-redis-host=redis",
  "--session-save-redis-port=6379",
  "--session-save-redis-db=2",
  "--session-save-redis-max-concurrency=20",
  "--cache-backend=redis",
  "--cache-backend-redis-server=redis",
  "--cache-backend-redis-db=0",
  "--cache-backend-redis-port=6379",
  "--page-cache=redis",
  "--page-cache-redis-server=redis",
  "--page-cache-redis-db=1",
  "--page-cache-redis-port=6379",
];

/** Folds the project's env.php.init.php overrides into the env.php written by setup:install. */
export const MERGE_ENV_PHP = [
  '$env = "<?php\\nreturn " . var_export(array_merge_recursive(',
  '  include("app/etc/env.php"),',
  '  include("app/etc/env.php.init.php")',
  '), true) . ";\\n";',
  'file_put_contents("app/etc/env.php", $env);',
].join("\n");

export interface InstallContext {
  runner: CommandRunner;
  plan: InitPlan;
  config: ProjectConfig;
  platform: NodeJS.Platform;
  homeDir: string;
  wardenVersion: string;
  clock?: () => Date;
}

function section(ctx: InstallContext, title: string): void {
  ui.section(title, ctx.clock ? ctx.clock() : new Date());
}

function warden(ctx: InstallContext, ...args: string[]): Promise<number> {
  return ctx.runner.run("warden", args);
}

function phpFpmArgs(args: string[]): string[] {
  return ["env", "exec", "-T", "php-fpm", ...args];
}

function phpFpm(ctx: InstallContext, ...args: string[]): Promise<number> {
  return ctx.runner.run("warden", phpFpmArgs(args));
}

function magento(ctx: InstallContext, ...args: string[]): Promise<number> {
  return phpFpm(ctx, "bin/magento", ...args);
}

export function certificatePath(homeDir: string, domain: string): string {
  return path.join(homeDir, ".warden", "ssl", "certs", `${domain}.crt.pem`);
}

export async function startWarden(ctx: InstallContext): Promise<void> {
  section(ctx, "Starting Warden");
  await warden(ctx, "up");
  const domain = ctx.config.traefikDomain;
  if (!(await fs.pathExists(certificatePath(ctx.homeDir, domain)))) {
    await warden(ctx, "sign-certificate", domain);
  }
}

export async function initializeEnvironment(ctx: InstallContext): Promise<void> {
  section(ctx, "Initializing environment");
  // images that only exist locally are fine
  await ctx.runner.run("warden", ["env", "pull", "--ignore-pull-failures"], { allowFailure: true });
  await warden(ctx, "env", "build", "--pull");
  await warden(ctx, "env", "up", "-d");
  await warden(ctx, "shell", "-c", WAIT_FOR_DB);

  if (ctx.platform === "darwin" && versionBelow(ctx.wardenVersion, WARDEN_AUTO_SYNC_VERSION)) {
    await warden(ctx, "sync", "start");
  }
}

export async function installMetaPackage(ctx: InstallContext): Promise<void> {
  section(ctx, "Installing meta-package");
  const { metaPackage, metaVersion } = ctx.plan;
  await phpFpm(
    ctx,
    "composer", "create-project", "-q", "--no-interaction", "--prefer-dist", "--no-install",
    "--repository-url=https://repo.magento.com/",
    metaPackage,
    CREATE_PROJECT_DIR,
    ...(metaVersion ? [metaVersion] : [])
  );
  await phpFpm(ctx, "rsync", "-a", `${CREATE_PROJECT_DIR}/`, `${APP_DIR}/`);
}

export async function installDependencies(ctx: InstallContext): Promise<void> {
  section(ctx, "Installing dependencies");
  await phpFpm(ctx, "composer", "global", "require", "hirak/prestissimo");
  await phpFpm(ctx, "composer", "install");
}

export async function importDatabase(ctx: InstallContext): Promise<void> {
  section(ctx, "Importing database");
  await warden(ctx, "db", "connect", "-e", `drop database ${DB_NAME}; create database ${DB_NAME};`);
  await ctx.runner.pipeGzipInto(ctx.plan.dbDump, "warden", ["db", "import"]);
}

export async function installApplication(ctx: InstallContext): Promise<void> {
  section(ctx, "Installing application");
  await phpFpm(ctx, "rm", "-vf", "app/etc/config.php", "app/etc/env.php");
  await magento(ctx, "setup:install", ...SETUP_INSTALL_ARGS);
}

export async function configureCleanInstall(ctx: InstallContext): Promise<void> {
  section(ctx, "Configuring application");
  const { frontUrl } = ctx.config;
  await phpFpm(ctx, "php", "-r", MERGE_ENV_PHP);
  await phpFpm(ctx, "cp", "-n", "app/etc/env.php", "app/etc/env.php.warden.php");
  await phpFpm(ctx, "ln", "-fsn", "env.php.warden.php", "app/etc/env.php");
  await magento(ctx, "app:config:import");

  await magento(ctx, "config:set", "-q", "--lock-env", "web/unsecure/base_url", frontUrl);
  await magento(ctx, "config:set", "-q", "--lock-env", "web/secure/base_url", frontUrl);

  await magento(ctx, "deploy:mode:set", "-s", "developer");
  await magento(ctx, "cache:disable", "block_html", "full_page");
  await magento(ctx, "app:config:dump", "themes", "scopes", "i18n");
}

export async function rebuildIndexes(ctx: InstallContext): Promise<void> {
  section(ctx, "Rebuilding indexes");
  await magento(ctx, "indexer:reindex");
}

export async function updateApplication(ctx: InstallContext): Promise<void> {
  section(ctx, "Configuring application");
  await phpFpm(ctx, "ln", "-fsn", "env.php.warden.php", "app/etc/env.php");

  section(ctx, "Updating application");
  await magento(ctx, "cache:flush");
  await magento(ctx, "app:config:import");
  await magento(ctx, "setup:db-schema:upgrade");
  await magento(ctx, "setup:db-data:upgrade");
}

export async function flushCache(ctx: InstallContext): Promise<void> {
  section(ctx, "Flushing cache");
  await magento(ctx, "cache:flush");
}

async function generatePassword(ctx: InstallContext): Promise<string> {
  const args = phpFpmArgs(["pwgen", "-n1", "16"]);
  const result = await ctx.runner.capture("warden", args);
  if (result.exitCode !== 0) {
    throw new CommandError(formatCommand("warden", args), result.exitCode);
  }
  const password = result.stdout.trim();
  if (!password) {
    throw new Error("pwgen did not return a password");
  }
  return password;
}

export async function createAdminUser(ctx: InstallContext): Promise<{ username: string; password: string }> {
  section(ctx, "Creating admin user");
  const password = await generatePassword(ctx);
  await magento(
    ctx,
    "admin:user:create",
    `--admin-password=${password}`,
    `--admin-user=${ADMIN_USER}`,
    "--admin-firstname=Local",
    "--admin-lastname=Admin",
    `--admin-email=${ADMIN_USER}@example.com`
  );
  return { username: ADMIN_USER, password };
}

export async function runInstall(ctx: InstallContext): Promise<InstallInfo> {
  const { plan } = ctx;

  await startWarden(ctx);
  await initializeEnvironment(ctx);

  if (plan.createProject) {
    await installMetaPackage(ctx);
  }
  await installDependencies(ctx);

  if (plan.dbImport) {
    await importDatabase(ctx);
  } else if (plan.cleanInstall) {
    await installApplication(ctx);
    await configureCleanInstall(ctx);
    await rebuildIndexes(ctx);
  }

  if (!plan.cleanInstall) {
    await updateApplication(ctx);
  }

  await flushCache(ctx);
  const admin = await createAdminUser(ctx);

  section(ctx, "Initialization complete");
  return {
    frontUrl: ctx.config.frontUrl,
    adminUrl: ctx.config.adminUrl,
    username: admin.username,
    password: admin.password,
  };
}
