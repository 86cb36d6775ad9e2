/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond type checking:
 * - Generated name prefixes can qualify a property key
 * - The unity tolerance is a small non-negative number
 *
 * @packageDocumentation
 */

import type { CompositionConfig, Config, MixtureSettingsConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Largest accepted unity tolerance. Beyond this a "normalized" mixture could
 * be missing a large share of its composition.
 */
export const MAX_UNITY_TOLERANCE = 0.01;

const NAME_PREFIX_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

/**
 * Validates mixture settings.
 *
 * @param mixture - The mixture settings to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateMixtureSettings(mixture: MixtureSettingsConfig, errors: ValidationError[]): void {
  if (!NAME_PREFIX_PATTERN.test(mixture.name_prefix)) {
    errors.push({
      field: 'mixture.name_prefix',
      value: mixture.name_prefix,
      message: `'mixture.name_prefix' must start with a letter and contain only letters, digits, '_' or '-', got '${mixture.name_prefix}'`,
    });
  }
}

/**
 * Validates composition settings.
 *
 * @param composition - The composition settings to validate.
 * @param errors - Array to accumulate errors into.
 */
function validateComposition(composition: CompositionConfig, errors: ValidationError[]): void {
  const tolerance = composition.unity_tolerance;
  if (!Number.isFinite(tolerance) || tolerance < 0 || tolerance > MAX_UNITY_TOLERANCE) {
    errors.push({
      field: 'composition.unity_tolerance',
      value: tolerance,
      message: `'composition.unity_tolerance' must be between 0 and ${String(MAX_UNITY_TOLERANCE)}, got ${String(tolerance)}`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateMixtureSettings(config.mixture, errors);
  validateComposition(config.composition, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
