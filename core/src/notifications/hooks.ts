/**
 * Canned hook notifications.
 *
 * Each one builds its own notifier and resolves to a HookOutcome. None of
 * them rejects: a hook that cannot notify must not fail the tool that ran it.
 */

import { ConfigError } from "../errors.js";
import { getErrorMessage } from "../logging/error-utils.js";
import { createLogger } from "../logging/logger.js";
import {
  DEFAULT_OPERATION_TYPE,
  FIELD_LABELS,
  NOTIFICATION_TITLES,
  STATUS_MESSAGES,
  longOperationTitle,
} from "./constants.js";
import { SlackNotifier } from "./slack-notifier.js";
import { formatDuration, mention, projectName } from "./utils.js";
import type { HookContext, HookOutcome, NotificationFields } from "./types.js";

async function deliver(
  ctx: HookContext,
  compose: (notifier: SlackNotifier, project: string) => { title: string; fields: NotificationFields },
): Promise<HookOutcome> {
  const logger = ctx.logger ?? createLogger();
  try {
    const notifier = new SlackNotifier({ env: ctx.env, fetch: ctx.fetch, logger });
    const { title, fields } = compose(notifier, projectName(ctx.cwd ?? process.cwd()));
    const result = await notifier.send(title, fields);
    if (!result.ok) {
      return { status: "failed", error: result.error };
    }
    logger.debug(`Sent "${title}"`);
    return { status: "sent" };
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.debug("Notification skipped:", err.message);
      return { status: "skipped", error: err };
    }
    logger.error("Notification failed:", getErrorMessage(err));
    return { status: "failed", error: err instanceof Error ? err : new Error(getErrorMessage(err)) };
  }
}

/** Claude is waiting for input or a permission decision. */
export function sendNotificationHook(ctx: HookContext = {}): Promise<HookOutcome> {
  return deliver(ctx, (notifier, project) => ({
    title: NOTIFICATION_TITLES.notification,
    fields: {
      [FIELD_LABELS.project]: project,
      [FIELD_LABELS.waitingStatus]: STATUS_MESSAGES.waiting,
      [FIELD_LABELS.dev]: mention(notifier.memberId),
    },
  }));
}

/** The main agent or a subagent stopped. */
export function sendStopHook(ctx: HookContext = {}): Promise<HookOutcome> {
  return deliver(ctx, (notifier, project) => ({
    title: NOTIFICATION_TITLES.stop,
    fields: {
      [FIELD_LABELS.project]: project,
      [FIELD_LABELS.stoppedStatus]: STATUS_MESSAGES.stopped,
      [FIELD_LABELS.dev]: mention(notifier.memberId),
    },
  }));
}

/**
 * An operation ran for `durationSeconds`. The caller decides whether that was long enough.
 */
export function sendLongOperationHook(
  durationSeconds: number,
  operationType: string = DEFAULT_OPERATION_TYPE,
  ctx: HookContext = {},
): Promise<HookOutcome> {
  return deliver(ctx, (notifier, project) => ({
    title: longOperationTitle(operationType),
    fields: {
      [FIELD_LABELS.duration]: formatDuration(durationSeconds),
      [FIELD_LABELS.project]: project,
      [FIELD_LABELS.dev]: mention(notifier.memberId),
    },
  }));
}
