/**
 * Error Handler - one-line, user-facing error messages
 */

import { handleError } from '@xolrisk/utils';

/**
 * Log the error and format it for the terminal as `Error [CODE]: message`
 */
export function formatError(error: unknown, context?: Record<string, unknown>): string {
  const { code, message } = handleError(error, context);
  // Keep the report to a single line
  const firstLine = message.split('\n')[0] ?? message;
  return `Error [${code}]: ${firstLine}`;
}
