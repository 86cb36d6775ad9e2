/**
 * Key ownership rules between a mixture and its components.
 *
 * A component's property `<element>.<property>` is visible on the mixture as
 * `<element>.<property>.<component>`. Unless the mixture already stores that
 * key itself, the component is authoritative for it and the mixture must not
 * shadow it.
 *
 * @packageDocumentation
 */

import type { PropertyStore } from '../store/index.js';
import { AlreadyOwnedByComponentError } from './errors.js';
import type { ComponentRegistry } from './registry.js';

/**
 * Lists the keys visible on a mixture.
 *
 * @param store - The mixture's own store.
 * @param registry - The mixture's components.
 * @param deep - Also list every component property suffixed with `.<component>`.
 * @returns Sorted, de-duplicated keys.
 */
export function listMixtureProps(
  store: PropertyStore,
  registry: ComponentRegistry,
  deep: boolean
): string[] {
  const props = new Set(store.keys());
  if (deep) {
    for (const key of componentOwnedKeys(store, registry).keys()) {
      props.add(key);
    }
  }
  return [...props].sort();
}

/**
 * Maps each key reachable only through a component to that component.
 *
 * @param store - The mixture's own store.
 * @param registry - The mixture's components.
 * @returns Deep keys not stored on the mixture, with their owning component.
 */
export function componentOwnedKeys(
  store: PropertyStore,
  registry: ComponentRegistry
): Map<string, string> {
  const owned = new Map<string, string>();
  for (const [name, component] of registry.list()) {
    for (const prop of component.listProperties()) {
      const key = `${prop}.${name}`;
      if (!store.has(key)) {
        owned.set(key, name);
      }
    }
  }
  return owned;
}

/**
 * Rejects writes that would shadow a component's property.
 *
 * @param key - Dotted key about to be written on the mixture.
 * @param store - The mixture's own store.
 * @param registry - The mixture's components.
 * @throws {AlreadyOwnedByComponentError} If a component provides the key.
 */
export function assertNotOwnedByComponent(
  key: string,
  store: PropertyStore,
  registry: ComponentRegistry
): void {
  const owner = componentOwnedKeys(store, registry).get(key);
  if (owner !== undefined) {
    throw new AlreadyOwnedByComponentError(key, owner);
  }
}
