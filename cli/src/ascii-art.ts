#!/usr/bin/env node
/**
 * ascii-art entry point.
 */

import { getErrorMessage } from "@toolshed/core/logging";
import { createAsciiArtProgram } from "./commands/index.js";

createAsciiArtProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${getErrorMessage(err)}`);
    process.exit(1);
  });
