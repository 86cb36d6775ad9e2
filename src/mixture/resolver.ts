/**
 * Key resolver: the mixture's read/write key protocol.
 *
 * Reads go through three stages: the mixture's own store, then the component
 * named by the key's qualifier, then an interleaved blend of all components.
 *
 * @packageDocumentation
 */

import { formatKey, toPropertyKey, withoutQualifier } from '../keys/index.js';
import type { KeyLike, PropertyKey } from '../keys/index.js';
import { KeyNotFoundError } from '../store/index.js';
import type { PropertyArray, PropertyStore, PropertyValues } from '../store/index.js';
import type { DiagnosticsChannel } from '../diagnostics/index.js';
import { MissingComponentPropertyError } from './errors.js';
import type { Interleaver } from './interleave.js';
import { assertNotOwnedByComponent, listMixtureProps } from './ownership.js';
import type { ComponentRegistry } from './registry.js';

/**
 * Options for creating a resolver.
 */
export interface KeyResolverOptions {
  store: PropertyStore;
  registry: ComponentRegistry;
  interleaver: Interleaver;
  diagnostics: DiagnosticsChannel;
}

/**
 * Resolves mixture property reads and guards writes.
 */
export class KeyResolver {
  private readonly store: PropertyStore;
  private readonly registry: ComponentRegistry;
  private readonly interleaver: Interleaver;
  private readonly diagnostics: DiagnosticsChannel;

  constructor(options: KeyResolverOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.interleaver = options.interleaver;
    this.diagnostics = options.diagnostics;
  }

  /**
   * Reads a property.
   *
   * @param key - Dotted or parsed key.
   * @returns The resolved values.
   * @throws {KeyNotFoundError} If no stage can produce the key.
   * @throws {CompositionNotNormalizedError} If a blend is needed and mole fractions are not unity.
   */
  get(key: KeyLike): PropertyArray {
    const parsed = toPropertyKey(key);
    const dotted = formatKey(parsed);

    if (this.store.has(dotted)) {
      return this.store.get(dotted);
    }

    const delegated = this.delegate(parsed);
    if (delegated !== undefined) {
      return delegated;
    }

    try {
      return this.interleaver.interleave(parsed);
    } catch (error) {
      if (!(error instanceof MissingComponentPropertyError)) {
        throw error;
      }
      this.diagnostics.record({
        code: 'interleave_degraded',
        severity: 'warning',
        message: error.message,
        element: parsed.element,
        key: dotted,
      });
      return this.store.get(dotted);
    }
  }

  /**
   * Writes a property on the mixture.
   *
   * @param key - Dotted or parsed key.
   * @param values - Scalar or per-instance values.
   * @throws {AlreadyOwnedByComponentError} If a component provides the key.
   */
  set(key: KeyLike, values: PropertyValues): void {
    const dotted = formatKey(toPropertyKey(key));
    assertNotOwnedByComponent(dotted, this.store, this.registry);
    this.store.set(dotted, values);
  }

  /**
   * Checks whether a read of the key would find a stored or delegated value.
   * Interleaved values are not considered.
   */
  has(key: KeyLike): boolean {
    return this.props(true).includes(formatKey(toPropertyKey(key)));
  }

  /**
   * Lists keys visible on the mixture.
   *
   * @param deep - Include component properties suffixed with `.<component>`.
   * @returns Sorted keys.
   */
  props(deep = false): string[] {
    return listMixtureProps(this.store, this.registry, deep);
  }

  private delegate(key: PropertyKey): PropertyArray | undefined {
    const { qualifier } = key;
    if (qualifier === undefined || !this.registry.has(qualifier)) {
      return undefined;
    }

    const component = this.registry.resolve(qualifier);
    try {
      return component.get(formatKey(withoutQualifier(key))).slice();
    } catch (error) {
      if (error instanceof KeyNotFoundError) {
        return undefined;
      }
      throw error;
    }
  }
}
