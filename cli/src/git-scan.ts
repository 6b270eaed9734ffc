#!/usr/bin/env node
/**
 * git-scan entry point.
 */

import { getErrorMessage } from "@toolshed/core/logging";
import { createGitScanProgram } from "./commands/index.js";

createGitScanProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(getErrorMessage(err));
    process.exit(1);
  });
