/**
 * Repository scanner.
 *
 * Walks a directory tree depth-first. A directory that is a git working
 * directory is reported and not descended into, so submodules and nested
 * checkouts never show up separately. `.git` directories are never entered
 * and symlinked directories are not followed.
 */

import { readdirSync } from "fs";
import * as path from "path";
import { getErrorMessage } from "../logging/error-utils.js";
import { createLogger } from "../logging/logger.js";
import { currentBranch, diffShortstat, isGitRepo } from "./git-queries.js";
import type { RepoScanResult, ScanOptions } from "./types.js";

export const DEFAULT_BRANCH = "main";

/**
 * Display path of `dir` relative to the scan root. The root itself is shown
 * by its own name.
 */
export function relativeRepoPath(root: string, dir: string): string {
  const relative = path.relative(root, dir);
  if (relative === "") {
    return path.basename(root) || ".";
  }
  return relative;
}

function childDirectories(dir: string, onError: (err: unknown) => void): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && entry.name !== ".git")
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(dir, name));
  } catch (err) {
    onError(err);
    return [];
  }
}

/**
 * Yield a result for every repository under `root` (including `root` itself),
 * in sorted depth-first order.
 */
export function* walkRepositories(root: string, options: ScanOptions): Generator<RepoScanResult> {
  const { git, defaultBranch = DEFAULT_BRANCH, logger = createLogger() } = options;
  const absoluteRoot = path.resolve(root);
  const pending: string[] = [absoluteRoot];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    if (isGitRepo(dir, git)) {
      const branch = currentBranch(dir, git);
      yield {
        path: dir,
        relativePath: relativeRepoPath(absoluteRoot, dir),
        branch,
        isDefaultBranch: branch.kind === "branch" && branch.name === defaultBranch,
        diff: diffShortstat(dir, git),
      };
      continue;
    }

    const children = childDirectories(dir, (err) =>
      logger.debug(`Skipping ${dir}:`, getErrorMessage(err)),
    );
    // Reverse so the stack pops children in sorted order
    for (let i = children.length - 1; i >= 0; i--) {
      pending.push(children[i]);
    }
  }
}

export function scanRepositories(root: string, options: ScanOptions): RepoScanResult[] {
  return [...walkRepositories(root, options)];
}

/**
 * A repository is worth reporting when it is off the default branch or has
 * uncommitted changes.
 */
export function shouldReport(result: RepoScanResult): boolean {
  return !result.isDefaultBranch || result.diff !== null;
}
