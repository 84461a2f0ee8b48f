/**
 * CLI-specific type definitions
 */

export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS = ['json', 'table'] as const satisfies readonly OutputFormat[];
