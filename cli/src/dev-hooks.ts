#!/usr/bin/env node
/**
 * dev-hooks entry point.
 *
 * Runs inside Claude Code hooks, so anything that slips past the commands
 * still exits 0.
 */

import { isDebugEnabled } from "@toolshed/core/config";
import { getErrorMessage } from "@toolshed/core/logging";
import { createDevHooksProgram } from "./commands/index.js";

createDevHooksProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (isDebugEnabled()) {
      console.error(`[dev-hooks] ${getErrorMessage(err)}`);
    }
    process.exit(0);
  });
