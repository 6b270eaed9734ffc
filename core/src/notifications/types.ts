/**
 * Notification types.
 */

import type { DeliveryError, ConfigError } from "../errors.js";
import type { Env, SlackConfig } from "../config/env.js";
import type { Logger } from "../logging/logger.js";

/**
 * Field label → value. Rendered in insertion order.
 */
export type NotificationFields = Readonly<Record<string, string>>;

export interface SlackTextObject {
  type: "plain_text" | "mrkdwn";
  text: string;
}

export interface SlackHeaderBlock {
  type: "header";
  text: SlackTextObject & { type: "plain_text" };
}

export interface SlackSectionBlock {
  type: "section";
  fields: Array<SlackTextObject & { type: "mrkdwn" }>;
}

export interface SlackMessage {
  blocks: [SlackHeaderBlock, SlackSectionBlock];
}

/** The subset of the global fetch the notifier relies on. */
export type FetchLike = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string },
) => Promise<{ status: number }>;

export type DeliveryResult = { ok: true } | { ok: false; error: DeliveryError };

export interface SlackNotifierOptions extends Partial<SlackConfig> {
  env?: Env;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Everything a canned hook notification needs from its surroundings.
 * Defaults: process.env, process.cwd(), global fetch, silent logger.
 */
export interface HookContext {
  env?: Env;
  cwd?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

export type HookOutcome =
  | { status: "sent" }
  | { status: "skipped"; error: ConfigError }
  | { status: "failed"; error: Error };
