/**
 * Types for the repository scanner.
 */

import type { Logger } from "../logging/logger.js";

export type GitResult = { ok: true; stdout: string } | { ok: false };

/**
 * Runs `git <args>` in `cwd` and returns trimmed stdout.
 * A non-zero exit is `{ ok: false }`; a missing git executable throws GitNotFoundError.
 */
export type GitRunner = (args: readonly string[], cwd: string) => GitResult;

export type BranchInfo =
  | { kind: "branch"; name: string }
  | { kind: "detached"; sha: string | null }
  | { kind: "unknown" };

export interface RepoScanResult {
  /** Absolute path of the working directory. */
  path: string;
  /** Path relative to the scan root; the root itself is shown by its basename. */
  relativePath: string;
  branch: BranchInfo;
  /** True only when `branch` is exactly the default branch. */
  isDefaultBranch: boolean;
  /** `git diff --shortstat HEAD` summary, or null when clean or unavailable. */
  diff: string | null;
}

export interface ScanOptions {
  git: GitRunner;
  /** Branch treated as the baseline. Default "main". */
  defaultBranch?: string;
  logger?: Logger;
}
