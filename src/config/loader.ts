/**
 * Loads arcade-forge.toml from disk and layers environment overrides on top.
 *
 * @packageDocumentation
 */

import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Default configuration file name, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'arcade-forge.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Path to the TOML file. Defaults to {@link CONFIG_FILE_NAME}. */
  path?: string;
  /** Environment to read overrides from. Defaults to process.env. */
  env?: EnvRecord;
}

/**
 * Loads, overrides and validates the configuration.
 *
 * A missing file is not an error: defaults are used. A file that exists but
 * fails to parse is.
 *
 * @param options - File path and environment.
 * @returns The effective configuration.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const path = options.path ?? CONFIG_FILE_NAME;
  const env = options.env ?? process.env;

  const fileConfig = (await safeExists(path))
    ? parseConfig(await safeReadFile(path))
    : getDefaultConfig();

  const config = applyEnvOverrides(fileConfig, env);
  assertConfigValid(config);
  return config;
}
