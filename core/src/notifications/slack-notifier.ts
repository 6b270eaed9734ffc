/**
 * Slack Notifier
 *
 * Builds a two-block Block Kit message (header + field section) and posts it
 * to an incoming webhook. Configuration is resolved once, at construction;
 * delivery never throws.
 */

import { loadSlackConfig } from "../config/env.js";
import { DeliveryError } from "../errors.js";
import { getErrorMessage } from "../logging/error-utils.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type {
  DeliveryResult,
  FetchLike,
  NotificationFields,
  SlackMessage,
  SlackNotifierOptions,
} from "./types.js";

export function buildSlackMessage(title: string, fields: NotificationFields): SlackMessage {
  return {
    blocks: [
      { type: "header", text: { type: "plain_text", text: title } },
      {
        type: "section",
        fields: Object.entries(fields).map(([name, value]) => ({
          type: "mrkdwn" as const,
          text: `*${name}:*\n${value}`,
        })),
      },
    ],
  };
}

export class SlackNotifier {
  readonly webhookUrl: string;
  readonly memberId: string;
  private fetchFn: FetchLike;
  private logger: Logger;

  /**
   * @throws ConfigError when the webhook URL or member ID is neither passed
   * in nor set in the environment.
   */
  constructor(options: SlackNotifierOptions = {}) {
    const config = loadSlackConfig(
      { webhookUrl: options.webhookUrl, memberId: options.memberId },
      options.env,
    );
    this.webhookUrl = config.webhookUrl;
    this.memberId = config.memberId;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger();
  }

  async send(title: string, fields: NotificationFields): Promise<DeliveryResult> {
    const message = buildSlackMessage(title, fields);
    return this.post(message);
  }

  private async post(message: SlackMessage): Promise<DeliveryResult> {
    try {
      const response = await this.fetchFn(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(message),
      });
      if (response.status !== 200) {
        const error = new DeliveryError(`Slack webhook returned status ${response.status}`, {
          status: response.status,
        });
        this.logger.warn(error.message);
        return { ok: false, error };
      }
      return { ok: true };
    } catch (err) {
      this.logger.warn("Slack webhook request failed:", getErrorMessage(err));
      return {
        ok: false,
        error: new DeliveryError(`Slack webhook request failed: ${getErrorMessage(err)}`, {
          cause: err,
        }),
      };
    }
  }
}
