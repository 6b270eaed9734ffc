/**
 * Environment configuration.
 *
 * The hook tools read everything they need from the environment:
 *   SLACK_WEBHOOK_URL  incoming-webhook endpoint
 *   SLACK_MEMBER_ID    member mentioned in every notification
 *   TOOLSHED_DEBUG     1/true/yes to log hook failures to stderr
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";

export type Env = Record<string, string | undefined>;

export interface SlackConfig {
  webhookUrl: string;
  memberId: string;
}

const slackConfigSchema = z.object({
  webhookUrl: z.string().url(),
  memberId: z.string().min(1),
});

const TRUTHY = new Set(["1", "true", "yes"]);

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve Slack settings from explicit overrides, falling back to the environment.
 * Throws ConfigError when either value is absent or the URL does not parse.
 */
export function loadSlackConfig(
  overrides: Partial<SlackConfig> = {},
  env: Env = process.env,
): SlackConfig {
  const webhookUrl = nonEmpty(overrides.webhookUrl) ?? nonEmpty(env.SLACK_WEBHOOK_URL);
  if (!webhookUrl) {
    throw new ConfigError("CONFIG_MISSING", "SLACK_WEBHOOK_URL environment variable not set");
  }

  const memberId = nonEmpty(overrides.memberId) ?? nonEmpty(env.SLACK_MEMBER_ID);
  if (!memberId) {
    throw new ConfigError("CONFIG_MISSING", "SLACK_MEMBER_ID environment variable not set");
  }

  const parsed = slackConfigSchema.safeParse({ webhookUrl, memberId });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      "CONFIG_INVALID",
      `Invalid Slack configuration: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`,
    );
  }
  return parsed.data;
}

export function isWebhookConfigured(env: Env = process.env): boolean {
  return nonEmpty(env.SLACK_WEBHOOK_URL) !== undefined;
}

export function isDebugEnabled(env: Env = process.env): boolean {
  const value = nonEmpty(env.TOOLSHED_DEBUG);
  return value !== undefined && TRUTHY.has(value.toLowerCase());
}
