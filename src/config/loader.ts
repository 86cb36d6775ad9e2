/**
 * Loads pore-mixture.toml from disk.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { applyEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import { assertConfigValid } from './validator.js';
import type { Config } from './types.js';

/**
 * Default configuration file name.
 */
export const CONFIG_FILE_NAME = 'pore-mixture.toml';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads, parses and validates a configuration file, then applies
 * environment overrides. A missing file yields the defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @param filePath - Path to the TOML file.
 * @param env - Environment to read overrides from (defaults to process.env).
 * @returns The effective configuration.
 * @throws ConfigParseError if the file cannot be read or parsed.
 * @throws ConfigValidationError if the effective configuration is invalid.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export async function loadConfig(
  filePath: string = CONFIG_FILE_NAME,
  env: EnvRecord = process.env
): Promise<Config> {
  let content: string | undefined;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    if (!isMissingFileError(error)) {
      const readError = error instanceof Error ? error : new Error(String(error));
      throw new ConfigParseError(`Cannot read '${filePath}': ${readError.message}`, readError);
    }
  }

  const fileConfig = content === undefined ? getDefaultConfig() : parseConfig(content);
  const config = applyEnvOverrides(fileConfig, env);
  assertConfigValid(config);

  return config;
}
