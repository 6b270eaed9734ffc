export type {
  HookCommand,
  HookMatcher,
  HookEvent,
  HooksConfig,
  HooksConfigOptions,
} from "./hooks-config.js";
export { getDefaultStartFile, getHooksConfig } from "./hooks-config.js";
