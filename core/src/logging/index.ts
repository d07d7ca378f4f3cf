/**
 * Logging Module
 *
 * Leveled console logging and error classification helpers.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger } from "./logger.js";
export {
  isNotFoundError,
  isPermissionError,
  isAlreadyExistsError,
  getErrorMessage,
} from "./error-utils.js";
