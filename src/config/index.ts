/**
 * Configuration module for pore-mixture.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  CompositionConfig,
  Config,
  LoggingConfig,
  MixtureSettingsConfig,
  PartialConfig,
} from './types.js';
export {
  DEFAULT_COMPOSITION,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_MIXTURE_SETTINGS,
} from './defaults.js';
export {
  ConfigValidationError,
  MAX_UNITY_TOLERANCE,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
