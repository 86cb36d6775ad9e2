/**
 * Default configuration values for pore-mixture.toml.
 *
 * @packageDocumentation
 */

import type {
  CompositionConfig,
  Config,
  LoggingConfig,
  MixtureSettingsConfig,
} from './types.js';

/**
 * Default mixture settings.
 */
export const DEFAULT_MIXTURE_SETTINGS: MixtureSettingsConfig = {
  name_prefix: 'mix',
};

/**
 * Default composition settings. The tolerance absorbs rounding in sums
 * such as 0.3 + 0.5 + (1 − 0.3 − 0.5).
 */
export const DEFAULT_COMPOSITION: CompositionConfig = {
  unity_tolerance: 1e-9,
  warn_out_of_range: true,
};

/**
 * Default logging configuration.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  level: 'warn',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  mixture: DEFAULT_MIXTURE_SETTINGS,
  composition: DEFAULT_COMPOSITION,
  logging: DEFAULT_LOGGING,
};
