/**
 * Long-operation workflow.
 *
 * Works out how long an operation took and sends the long-operation
 * notification when that exceeds the threshold. Without a webhook URL nothing
 * is read or deleted. Resolves to an outcome in every case; nothing here rejects.
 */

import { isWebhookConfigured } from "../config/env.js";
import { DEFAULT_OPERATION_TYPE, DEFAULT_THRESHOLD_SECONDS } from "../notifications/constants.js";
import { sendLongOperationHook } from "../notifications/hooks.js";
import { getErrorMessage } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { consumeStartFile } from "./start-file.js";
import type { DurationSource, LongOperationInput, LongOperationOutcome, TimingContext } from "./types.js";

/** Strictly greater: an operation lasting exactly `threshold` seconds is not long. */
export function shouldNotify(elapsedSeconds: number, threshold: number): boolean {
  return elapsedSeconds > threshold;
}

/**
 * Elapsed whole seconds for a duration source, or null when a start file
 * yields no timing information. A start file is deleted once read.
 */
export function resolveElapsedSeconds(
  source: DurationSource,
  options: { now?: number; logger?: Logger } = {},
): number | null {
  switch (source.kind) {
    case "explicit":
      return source.seconds;
    case "start-file":
      try {
        return consumeStartFile(source.path, options);
      } catch (err) {
        options.logger?.debug("Start file lookup failed:", getErrorMessage(err));
        return null;
      }
  }
}

export async function runLongOperation(
  input: LongOperationInput,
  ctx: TimingContext = {},
): Promise<LongOperationOutcome> {
  const {
    source,
    threshold = DEFAULT_THRESHOLD_SECONDS,
    operationType = DEFAULT_OPERATION_TYPE,
  } = input;
  const logger = ctx.logger ?? createLogger();
  const now = ctx.now ?? Date.now;

  if (!isWebhookConfigured(ctx.env ?? process.env)) {
    logger.debug("SLACK_WEBHOOK_URL not set, skipping", operationType);
    return { status: "not-configured" };
  }

  const elapsedSeconds = resolveElapsedSeconds(source, { now: now(), logger });
  if (elapsedSeconds === null) {
    return { status: "no-timing" };
  }

  if (!shouldNotify(elapsedSeconds, threshold)) {
    logger.debug(`${operationType} took ${elapsedSeconds}s, threshold ${threshold}s`);
    return { status: "below-threshold", elapsedSeconds };
  }

  const hook = await sendLongOperationHook(elapsedSeconds, operationType, ctx);
  return { status: "notified", elapsedSeconds, hook };
}
