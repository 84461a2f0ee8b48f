/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ConfigError } from '@xolrisk/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const [first] = result.error.issues;

  throw new ConfigError(
    `Invalid arguments: ${messages.join('; ')}`,
    first && first.path.length > 0 ? first.path.join('.') : undefined,
    { issues: result.error.issues }
  );
}
