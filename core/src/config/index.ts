export type { Env, SlackConfig } from "./env.js";
export { loadSlackConfig, isWebhookConfigured, isDebugEnabled } from "./env.js";
