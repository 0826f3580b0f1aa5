/**
 * @groundwork/logger
 *
 * Structured logging with secret redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS } from "./redact-paths.js";
