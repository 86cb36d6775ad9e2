/**
 * Tagged property keys for pore-network phase data.
 *
 * Every stored array is addressed by `<element>.<property>[.<qualifier>]`.
 * This module turns those dotted strings into an explicit
 * `{ element, property, qualifier }` value and back.
 *
 * @packageDocumentation
 */

/**
 * Network element kinds. Every per-instance array holds one value per
 * element instance of its kind.
 */
export type ElementKind = 'pore' | 'throat';

/**
 * All element kinds in the network.
 */
export const ELEMENT_KINDS: readonly ElementKind[] = ['pore', 'throat'] as const;

/**
 * Qualifier reserved for aggregate values such as `pore.mole_fraction.all`.
 */
export const AGGREGATE_QUALIFIER = 'all';

/**
 * A parsed property key.
 *
 * @remarks
 * `qualifier` is absent for mixture-level values, `'all'` for aggregates,
 * or the name of the component the value belongs to.
 */
export interface PropertyKey {
  readonly element: ElementKind;
  readonly property: string;
  readonly qualifier?: string;
}

/**
 * A key given either as its dotted form or already parsed.
 */
export type KeyLike = string | PropertyKey;

/**
 * Error thrown when a dotted key cannot be parsed.
 */
export class InvalidPropertyKeyError extends Error {
  /** The key that failed to parse. */
  public readonly key: string;
  /** Why the key was rejected. */
  public readonly reason: string;

  constructor(key: string, reason: string) {
    super(`Invalid property key '${key}': ${reason}`);
    this.name = 'InvalidPropertyKeyError';
    this.key = key;
    this.reason = reason;
  }
}

/**
 * Checks if a value is a valid ElementKind.
 *
 * @param value - The value to check.
 * @returns True if the value names an element kind.
 */
export function isElementKind(value: string): value is ElementKind {
  return value === 'pore' || value === 'throat';
}

/**
 * Parses a dotted key.
 *
 * Two segments give `element.property`. Three or more give
 * `element.property.qualifier`, where every segment between the first and
 * the last belongs to the property name.
 *
 * @param key - Dotted key such as `pore.mole_fraction.water`.
 * @returns The parsed key.
 * @throws {InvalidPropertyKeyError} If the key has fewer than two segments,
 * an empty segment, or an unknown element kind.
 *
 * @example
 * ```typescript
 * parseKey('pore.mole_fraction.water');
 * // { element: 'pore', property: 'mole_fraction', qualifier: 'water' }
 * ```
 */
export function parseKey(key: string): PropertyKey {
  const segments = key.split('.');
  const [element, ...rest] = segments;

  if (element === undefined || rest.length === 0) {
    throw new InvalidPropertyKeyError(key, 'expected <element>.<property>[.<qualifier>]');
  }
  if (segments.some((segment) => segment === '')) {
    throw new InvalidPropertyKeyError(key, 'empty segment');
  }
  if (!isElementKind(element)) {
    throw new InvalidPropertyKeyError(key, `unknown element kind '${element}'`);
  }

  if (rest.length === 1) {
    return { element, property: rest.join('.') };
  }

  const qualifier = rest[rest.length - 1];
  if (qualifier === undefined) {
    throw new InvalidPropertyKeyError(key, 'missing qualifier');
  }
  return { element, property: rest.slice(0, -1).join('.'), qualifier };
}

/**
 * Formats a parsed key back to its dotted form.
 *
 * @param key - The key to format.
 * @returns The dotted key.
 */
export function formatKey(key: PropertyKey): string {
  const base = `${key.element}.${key.property}`;
  return key.qualifier === undefined ? base : `${base}.${key.qualifier}`;
}

/**
 * Normalizes a key given in either form to its parsed form.
 *
 * @param key - Dotted or parsed key.
 * @returns The parsed key.
 */
export function toPropertyKey(key: KeyLike): PropertyKey {
  return typeof key === 'string' ? parseKey(key) : key;
}

/**
 * Normalizes a key given in either form to its dotted form.
 *
 * @param key - Dotted or parsed key.
 * @returns The dotted key.
 */
export function toKeyString(key: KeyLike): string {
  return typeof key === 'string' ? key : formatKey(key);
}

/**
 * Returns the key without its qualifier.
 *
 * @param key - The key to strip.
 * @returns `element.property` for the same element and property.
 */
export function withoutQualifier(key: PropertyKey): PropertyKey {
  return { element: key.element, property: key.property };
}

/**
 * Builds a component- or aggregate-qualified key.
 *
 * @param element - Element kind.
 * @param property - Property name.
 * @param qualifier - Component name or `'all'`.
 * @returns The dotted key.
 */
export function qualifiedKey(element: ElementKind, property: string, qualifier: string): string {
  return formatKey({ element, property, qualifier });
}
