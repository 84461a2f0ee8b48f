/**
 * YAML Configuration Loader
 * ==========================
 * Reads analysis files written in YAML. A missing or malformed file is a
 * configuration error: callers never get an empty object back in its place.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { load, YAMLException } from 'js-yaml';
import { ConfigError } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML text into a plain object
 */
export function parseYamlConfig(content: string, source: string = '<inline>'): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    const reason = error instanceof YAMLException ? error.reason : String(error);
    throw new ConfigError(`Malformed YAML in ${source}: ${reason}`, 'file', { source });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Expected a mapping at the top level of ${source}`, 'file', { source });
  }

  return parsed;
}

/**
 * Load configuration from a YAML file
 */
export function loadYamlConfig(configPath: string): Record<string, unknown> {
  const fullPath = resolve(configPath);

  if (!existsSync(fullPath)) {
    throw new ConfigError(`Config file not found: ${fullPath}`, 'file', { path: fullPath });
  }

  return parseYamlConfig(readFileSync(fullPath, 'utf-8'), fullPath);
}
