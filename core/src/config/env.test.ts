import { describe, it, expect } from "@jest/globals";
import { loadSlackConfig, isWebhookConfigured, isDebugEnabled } from "./env.js";
import { ConfigError } from "../errors.js";

const WEBHOOK = "https://hooks.example.test/services/T000/B000/test-secret";

describe("loadSlackConfig", () => {
  it("reads both values from the environment", () => {
    const config = loadSlackConfig({}, { SLACK_WEBHOOK_URL: WEBHOOK, SLACK_MEMBER_ID: "U123" });
    expect(config).toEqual({ webhookUrl: WEBHOOK, memberId: "U123" });
  });

  it("prefers explicit overrides over the environment", () => {
    const config = loadSlackConfig(
      { webhookUrl: "https://other.example.test/hook", memberId: "U999" },
      { SLACK_WEBHOOK_URL: WEBHOOK, SLACK_MEMBER_ID: "U123" },
    );
    expect(config).toEqual({ webhookUrl: "https://other.example.test/hook", memberId: "U999" });
  });

  it("throws CONFIG_MISSING without a webhook URL", () => {
    expect(() => loadSlackConfig({}, { SLACK_MEMBER_ID: "U123" })).toThrow(
      "SLACK_WEBHOOK_URL environment variable not set",
    );
  });

  it("throws CONFIG_MISSING without a member ID", () => {
    let caught: unknown;
    try {
      loadSlackConfig({}, { SLACK_WEBHOOK_URL: WEBHOOK });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "CONFIG_MISSING" });
  });

  it("treats whitespace-only values as missing", () => {
    expect(() => loadSlackConfig({}, { SLACK_WEBHOOK_URL: "  ", SLACK_MEMBER_ID: "U1" })).toThrow(
      ConfigError,
    );
  });

  it("throws CONFIG_INVALID for a malformed URL", () => {
    let caught: unknown;
    try {
      loadSlackConfig({}, { SLACK_WEBHOOK_URL: "not a url", SLACK_MEMBER_ID: "U1" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: "CONFIG_INVALID" });
    expect(caught instanceof Error ? caught.message : "").toMatch(/webhookUrl/);
  });
});

describe("isWebhookConfigured", () => {
  it("is true only for a non-empty SLACK_WEBHOOK_URL", () => {
    expect(isWebhookConfigured({ SLACK_WEBHOOK_URL: WEBHOOK })).toBe(true);
    expect(isWebhookConfigured({ SLACK_WEBHOOK_URL: "" })).toBe(false);
    expect(isWebhookConfigured({})).toBe(false);
  });
});

describe("isDebugEnabled", () => {
  it("accepts 1, true and yes in any case", () => {
    expect(isDebugEnabled({ TOOLSHED_DEBUG: "1" })).toBe(true);
    expect(isDebugEnabled({ TOOLSHED_DEBUG: "TRUE" })).toBe(true);
    expect(isDebugEnabled({ TOOLSHED_DEBUG: "yes" })).toBe(true);
  });

  it("is off for anything else", () => {
    expect(isDebugEnabled({ TOOLSHED_DEBUG: "0" })).toBe(false);
    expect(isDebugEnabled({ TOOLSHED_DEBUG: "" })).toBe(false);
    expect(isDebugEnabled({})).toBe(false);
  });
});
