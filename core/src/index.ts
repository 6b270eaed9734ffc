/**
 * @toolshed/core
 *
 * Logic behind the toolshed command-line utilities:
 *   ascii-art      text → block-letter rendering
 *   notifications  Slack webhook delivery for Claude Code hooks
 *   timing         start files and the long-operation workflow
 *   repo-scan      find git checkouts that are off their default branch or dirty
 *   hooks-config   settings.json block wiring the hook commands
 */

export * from "./errors.js";
export * from "./logging/index.js";
export * from "./config/index.js";
export * from "./ascii-art/index.js";
export * from "./notifications/index.js";
export * from "./timing/index.js";
export * from "./repo-scan/index.js";
export * from "./hooks-config/index.js";
