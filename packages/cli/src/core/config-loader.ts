/**
 * Config Loader - Load YAML analysis files with CLI override merging
 *
 * Config-first runner pattern:
 * - Load and parse the config file (JSON is read as YAML)
 * - Deep merge CLI overrides into config
 * - Leave validation to the simulation package, which owns the schema
 */

import { loadYamlConfig } from '@xolrisk/utils';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (CLI overrides win)
 *
 * Rules:
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merge (deep merge)
 * - undefined overrides are skipped
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? deepMerge(baseValue, value) : value;
  }

  return result;
}

/**
 * Load a config file and apply CLI overrides
 *
 * @throws ConfigError if the file is missing, malformed, or not a mapping
 */
export function loadConfig(
  configPath: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return deepMerge(loadYamlConfig(configPath), overrides);
}
