import * as path from "path";
import fs from "fs-extra";
import type { ProjectConfig } from "./project.js";
import { webPath } from "./project.js";

export const DEFAULT_META_PACKAGE = "magento/project-community-edition";

export interface InitOptions {
  cleanInstall: boolean;
  skipDbImport: boolean;
  metaPackage: string;
  metaVersion?: string;
  dbDump?: string;
}

export interface InitPlan {
  cleanInstall: boolean;
  dbImport: boolean;
  /** True when the web root has no composer.json yet and the meta-package must be created first */
  createProject: boolean;
  metaPackage: string;
  /** Empty means latest */
  metaVersion: string;
  dbDump: string;
  /** Paths relative to the project root, as shown to the user */
  requiredFiles: string[];
  warnings: string[];
}

export async function resolvePlan(
  options: InitOptions,
  config: ProjectConfig,
  root: string
): Promise<InitPlan> {
  const composerJson = webPath(config.webRoot, "composer.json");
  const hasComposerJson = await fs.pathExists(path.resolve(root, composerJson));
  const warnings: string[] = [];

  let cleanInstall = options.cleanInstall;
  if (!cleanInstall && !hasComposerJson) {
    warnings.push(`Implying --clean-install since file ${composerJson} not present`);
    cleanInstall = true;
  }
  const dbImport = !cleanInstall && !options.skipDbImport;
  const dbDump = options.dbDump || config.dbDump;

  const requiredFiles = [webPath(config.webRoot, "auth.json")];
  if (cleanInstall) {
    requiredFiles.push(webPath(config.webRoot, "app/etc/env.php.init.php"));
  }
  if (dbImport) {
    requiredFiles.push(dbDump, webPath(config.webRoot, "app/etc/env.php.warden.php"));
  }

  return {
    cleanInstall,
    dbImport,
    createProject: cleanInstall && !hasComposerJson,
    metaPackage: options.metaPackage,
    metaVersion: options.metaVersion ?? "",
    dbDump,
    requiredFiles,
    warnings,
  };
}
