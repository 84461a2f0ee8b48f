/**
 * @xolrisk/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export { createPackageLogger, getPackageLoggers, LogHelpers } from './logging/index.js';

export * from './config/index.js';

export * from './errors.js';
export { handleError, withErrorHandling } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
