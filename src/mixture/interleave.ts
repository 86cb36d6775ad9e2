/**
 * Interleaving: blends a property from every component, weighted by each
 * component's mole fraction.
 *
 * @packageDocumentation
 */

import { formatKey } from '../keys/index.js';
import type { ElementKind, PropertyKey } from '../keys/index.js';
import { ArrayLengthMismatchError, KeyNotFoundError, filledArray } from '../store/index.js';
import type { PropertyArray, PropertyStore } from '../store/index.js';
import { CompositionNotNormalizedError, MissingComponentPropertyError } from './errors.js';
import type { CompositionReconciler } from './reconciler.js';
import type { ComponentRegistry } from './registry.js';

/**
 * Options for creating an interleaver.
 */
export interface InterleaverOptions {
  store: PropertyStore;
  registry: ComponentRegistry;
  reconciler: CompositionReconciler;
  /** Largest |Σx − 1| treated as unity. */
  unityTolerance: number;
}

/**
 * Finds instances whose aggregate mole fraction is not unity.
 *
 * @param aggregate - Aggregate mole fractions.
 * @param tolerance - Largest accepted |Σx − 1|.
 * @returns Offending instance indices. NaN counts as offending.
 */
export function nonUnityIndices(aggregate: PropertyArray, tolerance: number): number[] {
  const indices: number[] = [];
  aggregate.forEach((value, index) => {
    if (!(Math.abs(value - 1) <= tolerance)) {
      indices.push(index);
    }
  });
  return indices;
}

/**
 * Computes composition-weighted blends of component properties.
 */
export class Interleaver {
  private readonly store: PropertyStore;
  private readonly registry: ComponentRegistry;
  private readonly reconciler: CompositionReconciler;
  private readonly unityTolerance: number;

  constructor(options: InterleaverOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.reconciler = options.reconciler;
    this.unityTolerance = options.unityTolerance;
  }

  /**
   * Blends `key` across all components.
   *
   * @param key - The property to blend; read from each component as given.
   * @returns Σ component[key] × mole fraction, element-wise.
   * @throws {CompositionNotNormalizedError} If the component mole fractions,
   * summed afresh, do not add to one.
   * @throws {MissingComponentPropertyError} If there are no components or any lacks the key.
   * @throws {ArrayLengthMismatchError} If a component array has the wrong length.
   */
  interleave(key: PropertyKey): PropertyArray {
    const dotted = formatKey(key);
    const components = this.registry.list();
    if (components.size === 0) {
      throw new MissingComponentPropertyError(dotted, []);
    }
    this.assertNormalized(key.element);

    const missing = [...components]
      .filter(([, component]) => !component.listProperties().has(dotted))
      .map(([name]) => name);
    if (missing.length > 0) {
      throw new MissingComponentPropertyError(dotted, missing);
    }

    const count = this.store.count(key.element);
    const result = filledArray(count, 0);
    for (const [name, component] of components) {
      const values = this.readComponent(component.get.bind(component), dotted, name);
      if (values.length !== count) {
        throw new ArrayLengthMismatchError(`${dotted}.${name}`, count, values.length);
      }
      const fraction = this.reconciler.readMoleFraction(name, key.element);
      result.forEach((value, index) => {
        result[index] = value + (values[index] ?? Number.NaN) * (fraction[index] ?? Number.NaN);
      });
    }
    return result;
  }

  private readComponent(
    read: (key: string) => PropertyArray,
    dotted: string,
    name: string
  ): PropertyArray {
    try {
      return read(dotted);
    } catch (error) {
      if (error instanceof KeyNotFoundError) {
        throw new MissingComponentPropertyError(dotted, [name]);
      }
      throw error;
    }
  }

  private assertNormalized(element: ElementKind): void {
    const recomputed = this.reconciler.recomputeAggregate(element);
    const offending = nonUnityIndices(recomputed, this.unityTolerance);
    if (offending.length > 0) {
      throw new CompositionNotNormalizedError(element, offending);
    }
  }
}
