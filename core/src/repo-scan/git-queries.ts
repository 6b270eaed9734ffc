/**
 * Per-directory git queries used by the scanner.
 */

import { existsSync } from "fs";
import * as path from "path";
import type { BranchInfo, GitRunner } from "./types.js";

/**
 * A directory is a repository when it has a `.git` entry (directory, or file
 * for worktrees and submodules), or when git says it is inside a work tree.
 */
export function isGitRepo(dir: string, git: GitRunner): boolean {
  if (existsSync(path.join(dir, ".git"))) {
    return true;
  }
  const result = git(["rev-parse", "--is-inside-work-tree"], dir);
  return result.ok && result.stdout === "true";
}

export function currentBranch(dir: string, git: GitRunner): BranchInfo {
  const ref = git(["rev-parse", "--abbrev-ref", "HEAD"], dir);
  if (!ref.ok) {
    return { kind: "unknown" };
  }
  if (ref.stdout === "HEAD") {
    const sha = git(["rev-parse", "--short", "HEAD"], dir);
    return { kind: "detached", sha: sha.ok && sha.stdout ? sha.stdout : null };
  }
  return { kind: "branch", name: ref.stdout };
}

/**
 * Staged and unstaged changes against HEAD as a one-line summary,
 * or null when there are none (or git cannot tell).
 */
export function diffShortstat(dir: string, git: GitRunner): string | null {
  const result = git(["diff", "--shortstat", "HEAD"], dir);
  if (!result.ok || !result.stdout) {
    return null;
  }
  return result.stdout;
}

export function branchLabel(branch: BranchInfo): string {
  switch (branch.kind) {
    case "branch":
      return branch.name;
    case "detached":
      return `DETACHED@${branch.sha ?? "?"}`;
    case "unknown":
      return "UNKNOWN";
  }
}
