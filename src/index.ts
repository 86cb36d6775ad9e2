/**
 * pore-mixture
 *
 * Multi-component fluid mixtures for pore-network models, composed from
 * independently modelled pure-component phases.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export {
  AGGREGATE_QUALIFIER,
  ELEMENT_KINDS,
  InvalidPropertyKeyError,
  formatKey,
  isElementKind,
  parseKey,
  qualifiedKey,
  toKeyString,
  toPropertyKey,
  withoutQualifier,
} from './keys/index.js';
export type { ElementKind, KeyLike, PropertyKey } from './keys/index.js';

export {
  ArrayLengthMismatchError,
  KeyNotFoundError,
  PropertyStore,
  broadcast,
  filledArray,
} from './store/index.js';
export type { ElementCounts, PropertyArray, PropertyValues } from './store/index.js';

export { DuplicateNameError, InvalidNameError, NotFoundError, Phase, Project } from './project/index.js';
export type { ComponentPhase, ComponentRef, PhaseOptions } from './project/index.js';

export {
  AlreadyOwnedByComponentError,
  CompositionNotNormalizedError,
  InsufficientConcentrationDataError,
  MissingComponentPropertyError,
  Mixture,
  NotInMixtureError,
  NotInProjectError,
  SUMMARY_RULE,
  formatMixture,
} from './mixture/index.js';
export type { HealthReport, MixtureOptions } from './mixture/index.js';

export { DEFAULT_FINDINGS_CAPACITY, DiagnosticsChannel } from './diagnostics/index.js';
export type { Finding, FindingCode, FindingSeverity } from './diagnostics/index.js';

export { Logger, createLogger, isValidLogThreshold } from './logging/index.js';
export type { LogEntry, LogLevel, LogThreshold, LoggerOptions } from './logging/index.js';

export {
  CONFIG_FILE_NAME,
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  EnvCoercionError,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from './config/index.js';
export type { Config, PartialConfig } from './config/index.js';
