/**
 * Notifications barrel export
 */

export type {
  NotificationFields,
  SlackMessage,
  SlackHeaderBlock,
  SlackSectionBlock,
  SlackTextObject,
  FetchLike,
  DeliveryResult,
  SlackNotifierOptions,
  HookContext,
  HookOutcome,
} from "./types.js";

export {
  DEFAULT_THRESHOLD_SECONDS,
  DEFAULT_OPERATION_TYPE,
  NOTIFICATION_TITLES,
  FIELD_LABELS,
  STATUS_MESSAGES,
  longOperationTitle,
} from "./constants.js";

export { formatDuration, projectName, mention } from "./utils.js";
export { SlackNotifier, buildSlackMessage } from "./slack-notifier.js";
export { sendNotificationHook, sendStopHook, sendLongOperationHook } from "./hooks.js";
