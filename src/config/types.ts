/**
 * Configuration types for pore-mixture.toml parsing.
 *
 * @packageDocumentation
 */

import type { LogThreshold } from '../logging/index.js';

/**
 * Settings for mixture objects.
 */
export interface MixtureSettingsConfig {
  /** Prefix for generated mixture names (default: 'mix'). */
  name_prefix: string;
}

/**
 * Settings for composition bookkeeping.
 */
export interface CompositionConfig {
  /** Largest |Σx − 1| still treated as unity (default: 1e-9). */
  unity_tolerance: number;
  /** Whether out-of-range mole fractions record a warning finding. */
  warn_out_of_range: boolean;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Minimum level written to the log. */
  level: LogThreshold;
}

/**
 * Complete configuration object parsed from pore-mixture.toml.
 */
export interface Config {
  /** Mixture object settings. */
  mixture: MixtureSettingsConfig;
  /** Composition bookkeeping settings. */
  composition: CompositionConfig;
  /** Logging settings. */
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  mixture?: Partial<MixtureSettingsConfig>;
  composition?: Partial<CompositionConfig>;
  logging?: Partial<LoggingConfig>;
}
