/**
 * Start-file persistence.
 *
 * A start file holds one Unix timestamp in whole seconds. It is written when
 * an operation begins and consumed (read, then deleted) when it ends.
 */

import { mkdirSync, readFileSync, unlinkSync, writeFileSync } from "fs";
import * as path from "path";
import { StartFileError } from "../errors.js";
import { getErrorMessage, isNotFoundError } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";

export type StartTimestampResult =
  | { ok: true; startedAt: number }
  | { ok: false; error: StartFileError };

/**
 * Write the current time (epoch seconds) to `filePath`, creating parent
 * directories. Filesystem errors propagate.
 */
export function createStartFile(filePath: string, now: number = Date.now()): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, String(Math.floor(now / 1000)));
}

/**
 * Read the start timestamp (epoch seconds, fractional allowed) from `filePath`.
 */
export function readStartTimestamp(filePath: string): StartTimestampResult {
  let contents: string;
  try {
    contents = readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: new StartFileError(
        "START_FILE_UNREADABLE",
        filePath,
        isNotFoundError(err)
          ? `Start file not found: ${filePath}`
          : `Could not read start file ${filePath}: ${getErrorMessage(err)}`,
        { cause: err },
      ),
    };
  }

  const trimmed = contents.trim();
  const startedAt = trimmed === "" ? NaN : Number(trimmed);
  if (!Number.isFinite(startedAt)) {
    return {
      ok: false,
      error: new StartFileError(
        "START_FILE_INVALID",
        filePath,
        `Start file ${filePath} does not contain a timestamp`,
      ),
    };
  }
  return { ok: true, startedAt };
}

/**
 * Read the start file, delete it, and return whole seconds elapsed since the
 * recorded timestamp. Returns null when there is no usable timestamp.
 * Deletion is best effort; a file that cannot be removed is only logged.
 */
export function consumeStartFile(
  filePath: string,
  options: { now?: number; logger?: Logger } = {},
): number | null {
  const { now = Date.now(), logger = createLogger() } = options;
  const result = readStartTimestamp(filePath);

  try {
    unlinkSync(filePath);
  } catch (err) {
    if (!isNotFoundError(err)) {
      logger.debug("Could not remove start file:", getErrorMessage(err));
    }
  }

  if (!result.ok) {
    logger.debug(result.error.message);
    return null;
  }
  return Math.trunc(now / 1000 - result.startedAt);
}
