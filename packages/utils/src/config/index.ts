/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for the settings that do not belong
 * in an analysis file (logging destinations and verbosity).
 */

import * as path from 'path';

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

/**
 * Load logging configuration from environment variables
 *
 * File logging is opt-in (`LOG_FILE=true`).
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const { LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE, NODE_ENV } = env;

  return {
    level: LOG_LEVEL || (NODE_ENV === 'production' ? 'info' : 'debug'),
    enableConsole: LOG_CONSOLE !== 'false',
    enableFile: LOG_FILE === 'true',
    logDir: LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: LOG_MAX_FILES || '14d',
    maxSize: LOG_MAX_SIZE || '20m',
  };
}

export * from './yaml-config.js';
