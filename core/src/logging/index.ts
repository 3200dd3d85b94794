/**
 * Logging Module
 *
 * Logger, status-line reporting, and error classification helpers.
 */

export type { Logger, LoggerOptions } from "./logger.js";
export { createLogger, createDebugLogger } from "./logger.js";
export type { StatusReporter, StatusReporterOptions, StatusLevel } from "./status-reporter.js";
export {
  createStatusReporter,
  formatStatusLine,
  shouldUseColor,
  paint,
} from "./status-reporter.js";
export {
  isNotFoundError,
  isPermissionError,
  isAlreadyExistsError,
  getErrorMessage,
} from "./error-utils.js";
