/**
 * Titles, labels and defaults for hook notifications.
 */

export const DEFAULT_THRESHOLD_SECONDS = 30;
export const DEFAULT_OPERATION_TYPE = "Operation";

export const NOTIFICATION_TITLES = {
  notification: "🔔 Claude Code Notification",
  stop: "⏹️ Claude Code Stopped",
} as const;

export function longOperationTitle(operationType: string): string {
  return `⚠️ Long ${operationType} Operation`;
}

export const FIELD_LABELS = {
  project: "📁 Project",
  waitingStatus: "💬 Status",
  stoppedStatus: "🛑 Status",
  duration: "⏱️ Duration",
  dev: "👤 Dev",
} as const;

export const STATUS_MESSAGES = {
  waiting: "Waiting for user input or permission",
  stopped: "Operation stopped or subagent stopped",
} as const;
