/**
 * Errors raised by mixture operations.
 *
 * @packageDocumentation
 */

import type { ElementKind } from '../keys/index.js';

/**
 * Error thrown when a component is not registered in the mixture's project.
 */
export class NotInProjectError extends Error {
  /** The component name. */
  public readonly component: string;

  constructor(component: string) {
    super(`${component} doesn't belong to this project`);
    this.name = 'NotInProjectError';
    this.component = component;
  }
}

/**
 * Error thrown when an operation targets a component the mixture does not hold.
 */
export class NotInMixtureError extends Error {
  /** The component name. */
  public readonly component: string;
  /** The mixture name. */
  public readonly mixture: string;

  constructor(component: string, mixture: string) {
    super(`${component} doesn't belong to mixture '${mixture}'`);
    this.name = 'NotInMixtureError';
    this.component = component;
    this.mixture = mixture;
  }
}

/**
 * Error thrown when writing a key that a component already provides.
 */
export class AlreadyOwnedByComponentError extends Error {
  /** The rejected key. */
  public readonly key: string;
  /** The component that owns the key. */
  public readonly component: string;

  constructor(key: string, component: string) {
    super(`${key} already assigned to component '${component}'`);
    this.name = 'AlreadyOwnedByComponentError';
    this.key = key;
    this.component = component;
  }
}

/**
 * Error thrown when mole fractions do not sum to one before a blend.
 */
export class CompositionNotNormalizedError extends Error {
  /** The element kind checked. */
  public readonly element: ElementKind;
  /** Instances whose aggregate mole fraction is not unity. */
  public readonly indices: readonly number[];

  constructor(element: ElementKind, indices: readonly number[]) {
    super(
      `Mole fraction does not add to unity in all ${element}s (${String(indices.length)} offending)`
    );
    this.name = 'CompositionNotNormalizedError';
    this.element = element;
    this.indices = indices;
  }
}

/**
 * Error thrown when a component lacks a property needed for a blend.
 */
export class MissingComponentPropertyError extends Error {
  /** The requested key. */
  public readonly key: string;
  /** Components that lack the key. */
  public readonly components: readonly string[];

  constructor(key: string, components: readonly string[]) {
    super(
      components.length === 0
        ? `Cannot interleave '${key}': mixture has no components`
        : `Cannot interleave '${key}': missing on ${components.join(', ')}`
    );
    this.name = 'MissingComponentPropertyError';
    this.key = key;
    this.components = components;
  }
}

/**
 * Error thrown when concentrations are required but not all are stored.
 */
export class InsufficientConcentrationDataError extends Error {
  /** The element kind being normalized. */
  public readonly element: ElementKind;
  /** Components with no concentration on the mixture or on themselves. */
  public readonly missing: readonly string[];

  constructor(element: ElementKind, missing: readonly string[]) {
    super(`Missing ${element} concentration for: ${missing.join(', ')}`);
    this.name = 'InsufficientConcentrationDataError';
    this.element = element;
    this.missing = missing;
  }
}
