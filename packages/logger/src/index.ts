/**
 * @docrelay/logger
 *
 * Structured logging with secret redaction for the docrelay pipeline.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { maskSecret, REDACT_PATHS } from "./pii-redactor.js";
