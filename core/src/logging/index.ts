/**
 * Logging Module
 *
 * Logger factory and error classification shared by every tool.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger } from "./logger.js";
export {
  getErrorCode,
  isNotFoundError,
  getErrorMessage,
} from "./error-utils.js";
