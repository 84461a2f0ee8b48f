/**
 * Centralized Logging System
 * ==========================
 * Package-aware logging with namespaces.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@xolrisk/utils';
 *
 * const logger = createPackageLogger('@xolrisk/simulation');
 * logger.info('Scenario completed', { scenario: 'baseline' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log performance metric
   */
  static performance(logger: Logger, operation: string, duration: number, context?: LogContext): void {
    const level = duration > 5000 ? 'warn' : 'debug';
    logger[level](`Performance: ${operation}`, { operation, duration, ...context });
  }

  /**
   * Log a completed scenario run
   */
  static scenario(
    logger: Logger,
    scenario: string,
    trials: number,
    duration: number,
    context?: LogContext
  ): void {
    logger.debug('Scenario completed', { scenario, trials, duration, ...context });
  }
}
