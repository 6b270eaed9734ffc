/**
 * Git process runner.
 *
 * Synchronous on purpose: the scanner is a one-shot CLI that visits
 * repositories one at a time.
 */

import { execFileSync } from "child_process";
import { existsSync } from "fs";
import { GitNotFoundError } from "../errors.js";
import { isNotFoundError } from "../logging/error-utils.js";
import type { GitResult, GitRunner } from "./types.js";

export function createGitRunner(options: { executable?: string } = {}): GitRunner {
  const executable = options.executable ?? "git";

  return (args: readonly string[], cwd: string): GitResult => {
    try {
      const stdout = execFileSync(executable, [...args], {
        cwd,
        encoding: "utf8",
        stdio: ["ignore", "pipe", "ignore"],
      });
      return { ok: true, stdout: stdout.trim() };
    } catch (err) {
      // spawn reports a missing cwd as ENOENT too, naming the executable either way
      if (isNotFoundError(err) && existsSync(cwd)) {
        throw new GitNotFoundError({ cause: err });
      }
      return { ok: false };
    }
  };
}
