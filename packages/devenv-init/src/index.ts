#!/usr/bin/env node

/**
 * devenv-init - bootstrap a Warden-based Magento 2 development environment
 */

import { createRequire } from "module";
import { buildProgram, reportError } from "./cli.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

buildProgram(pkg.version)
  .parseAsync()
  .catch((err: unknown) => {
    process.exitCode = reportError(err);
  });
