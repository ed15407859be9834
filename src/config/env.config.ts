/**
 * Environment defaults.
 *
 * The entry point loads `.env` through dotenv before calling this, so the
 * values can come from the shell or from a local `.env` file. Command-line
 * flags always take precedence.
 *
 * Variables:
 * - THEMES_SEED: default seed phrase for reproducible runs
 * - THEMES_TABLE_WIDTH: default maximum column width for `--table`
 * - THEMES_LOG_TIMESTAMP: default `--timestamp` mode (none, sec, ms, ns)
 */

import type { TimestampMode } from '../types/config.types';
import { ConfigurationError } from '../utils/error-handler';
import {
  validatePositiveInteger,
  validateTimestampMode,
} from '../validation/cli.validation';

export interface EnvConfig {
  seed?: string;
  tableWidth?: number;
  timestamp?: TimestampMode;
}

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

/**
 * @throws {ConfigurationError} If a variable is set to an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const config: EnvConfig = {};

  const seed = readVar(env, 'THEMES_SEED');
  if (seed !== undefined) {
    config.seed = seed;
  }

  const tableWidth = readVar(env, 'THEMES_TABLE_WIDTH');
  if (tableWidth !== undefined) {
    const result = validatePositiveInteger(tableWidth, 'THEMES_TABLE_WIDTH');
    if (!result.isValid) {
      throw new ConfigurationError(result.errors[0].message);
    }
    config.tableWidth = result.value;
  }

  const timestamp = readVar(env, 'THEMES_LOG_TIMESTAMP');
  if (timestamp !== undefined) {
    const result = validateTimestampMode(timestamp, 'THEMES_LOG_TIMESTAMP');
    if (!result.isValid) {
      throw new ConfigurationError(result.errors[0].message);
    }
    config.timestamp = result.value;
  }

  return config;
}
