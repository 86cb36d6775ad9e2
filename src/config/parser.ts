/**
 * TOML configuration parser for pore-mixture.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isValidLogThreshold } from '../logging/index.js';
import {
  DEFAULT_COMPOSITION,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_MIXTURE_SETTINGS,
} from './defaults.js';
import type {
  CompositionConfig,
  Config,
  LoggingConfig,
  MixtureSettingsConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows a TOML section to a table.
 *
 * @param value - Raw section value.
 * @param fieldPath - Path to the section for error messages.
 * @returns The table, or undefined when the section is absent.
 * @throws ConfigParseError if the section is present but not a table.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Parses mixture settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the mixture section.
 * @returns Validated mixture settings merged with defaults.
 */
function parseMixtureSettings(raw: Record<string, unknown> | undefined): MixtureSettingsConfig {
  const result: MixtureSettingsConfig = { ...DEFAULT_MIXTURE_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('name_prefix' in raw) {
    result.name_prefix = validateString(raw.name_prefix, 'mixture.name_prefix');
  }

  return result;
}

/**
 * Parses composition settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the composition section.
 * @returns Validated composition settings merged with defaults.
 */
function parseComposition(raw: Record<string, unknown> | undefined): CompositionConfig {
  const result: CompositionConfig = { ...DEFAULT_COMPOSITION };
  if (raw === undefined) {
    return result;
  }

  if ('unity_tolerance' in raw) {
    result.unity_tolerance = validateNumber(raw.unity_tolerance, 'composition.unity_tolerance');
  }
  if ('warn_out_of_range' in raw) {
    result.warn_out_of_range = validateBoolean(
      raw.warn_out_of_range,
      'composition.warn_out_of_range'
    );
  }

  return result;
}

/**
 * Parses logging settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the logging section.
 * @returns Validated logging settings merged with defaults.
 */
function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('level' in raw) {
    const level = validateString(raw.level, 'logging.level');
    if (!isValidLogThreshold(level)) {
      throw new ConfigParseError(
        `Invalid value for 'logging.level': expected 'debug', 'info', 'warn', 'error', or 'silent', got '${level}'`
      );
    }
    result.level = level;
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [composition]
 * unity_tolerance = 1e-6
 * `);
 * console.log(config.composition.unity_tolerance); // 0.000001
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    mixture: parseMixtureSettings(validateSection(parsed.mixture, 'mixture')),
    composition: parseComposition(validateSection(parsed.composition, 'composition')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return {
    mixture: { ...DEFAULT_CONFIG.mixture },
    composition: { ...DEFAULT_CONFIG.composition },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
