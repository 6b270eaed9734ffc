/**
 * Human-readable and JSON rendering of scan results.
 */

import chalk from "chalk";
import { branchLabel } from "./git-queries.js";
import type { RepoScanResult } from "./types.js";

/**
 * Summary block for one repository: the path, then the branch when it is not
 * the default, then the diff when there is one. Ends with a blank line that
 * separates it from the next block.
 */
export function formatRepoSummary(result: RepoScanResult, palette: chalk.Chalk = chalk): string {
  const lines = [palette.bold.cyan(result.relativePath)];

  if (!result.isDefaultBranch) {
    const color = result.branch.kind === "detached" ? palette.magenta : palette.yellow;
    lines.push(`  branch: ${color(branchLabel(result.branch))}`);
  }

  if (result.diff !== null) {
    lines.push(`  diff:   ${palette.red(result.diff)}`);
  }

  return `${lines.join("\n")}\n\n`;
}

export interface RepoReportEntry {
  path: string;
  branch: string;
  detached: boolean;
  diff: string | null;
}

export function toReportEntry(result: RepoScanResult): RepoReportEntry {
  return {
    path: result.relativePath,
    branch: branchLabel(result.branch),
    detached: result.branch.kind === "detached",
    diff: result.diff,
  };
}
