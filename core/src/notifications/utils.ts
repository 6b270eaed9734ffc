/**
 * Notification formatting helpers.
 */

import * as path from "path";

/**
 * Format whole seconds as "Xm Ys" (always both parts, e.g. "0m 45s").
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.trunc(totalSeconds));
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

/** Project label for a working directory: its last path segment. */
export function projectName(cwd: string): string {
  return path.basename(cwd);
}

/** Slack mention syntax for a member ID. */
export function mention(memberId: string): string {
  return `<@${memberId}>`;
}
