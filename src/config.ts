/**
 * Configuration loader
 *
 * Reads brickhub.yml (or the given path), validates it and fills in
 * defaults. A missing file means all defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { Config, formatZodError, validateConfig } from './config-schema';

export type { Config, ConnectionConfig, HubSettings, LoggingConfig } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'brickhub.yml';

/** Validate an already-parsed config object */
export function parseConfig(data: unknown): Config {
  try {
    // An empty YAML document parses to null
    return validateConfig(data ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Load config from YAML. `found` tells the caller whether a file was read,
 * so it can log that once the logger is set up.
 */
export function loadConfig(configPath?: string): { config: Config; path: string; found: boolean } {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new Error(`[Config] Config file not found: ${resolvedPath}`);
    }
    return { config: parseConfig({}), path: resolvedPath, found: false };
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const parsed: unknown = parse(raw);
  return { config: parseConfig(parsed), path: resolvedPath, found: true };
}
