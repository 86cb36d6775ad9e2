/**
 * In-memory property storage for phase objects.
 *
 * Maps dotted keys to numeric arrays sized to the number of element
 * instances of the key's element kind.
 *
 * @packageDocumentation
 */

import { parseKey } from '../keys/index.js';
import type { ElementKind } from '../keys/index.js';

/**
 * Per-instance values for one property.
 */
export type PropertyArray = Float64Array;

/**
 * Values accepted when writing a property. A scalar or a one-element
 * array is broadcast to every element instance.
 */
export type PropertyValues = number | ArrayLike<number>;

/**
 * Number of instances of each element kind in the network.
 */
export type ElementCounts = Readonly<Record<ElementKind, number>>;

/**
 * Error thrown when a key is not present in a store.
 */
export class KeyNotFoundError extends Error {
  /** The key that was requested. */
  public readonly key: string;

  constructor(key: string) {
    super(`Key '${key}' not found`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Error thrown when an array does not match its element count.
 */
export class ArrayLengthMismatchError extends Error {
  /** The key being written or read. */
  public readonly key: string;
  /** The length the element kind requires. */
  public readonly expected: number;
  /** The length that was received. */
  public readonly actual: number;

  constructor(key: string, expected: number, actual: number) {
    super(`Array for '${key}' must have length ${String(expected)}, got ${String(actual)}`);
    this.name = 'ArrayLengthMismatchError';
    this.key = key;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Creates an array of the given length filled with one value.
 *
 * @param length - Number of element instances.
 * @param value - Fill value.
 * @returns The filled array.
 */
export function filledArray(length: number, value: number): PropertyArray {
  return new Float64Array(length).fill(value);
}

/**
 * Expands values to a full-length array.
 *
 * @param key - Key used in error messages.
 * @param values - Scalar or array values.
 * @param length - Required length.
 * @returns A new array of `length` values.
 * @throws {ArrayLengthMismatchError} If an array of another length (other than one) is given.
 */
export function broadcast(key: string, values: PropertyValues, length: number): PropertyArray {
  if (typeof values === 'number') {
    return filledArray(length, values);
  }
  if (values.length === 1 && length !== 1) {
    return filledArray(length, values[0] ?? Number.NaN);
  }
  if (values.length !== length) {
    throw new ArrayLengthMismatchError(key, length, values.length);
  }
  return Float64Array.from(values);
}

/**
 * Key-value store of per-instance arrays.
 *
 * @example
 * ```typescript
 * const store = new PropertyStore({ pore: 3, throat: 2 });
 * store.set('pore.temperature', 298);
 * store.get('pore.temperature'); // Float64Array [298, 298, 298]
 * ```
 */
export class PropertyStore {
  private readonly counts: ElementCounts;
  private readonly data = new Map<string, PropertyArray>();

  /**
   * Creates an empty store.
   *
   * @param counts - Instance counts per element kind.
   */
  constructor(counts: ElementCounts) {
    this.counts = counts;
  }

  /**
   * Gets the number of instances of an element kind.
   *
   * @param element - The element kind.
   * @returns The instance count.
   */
  count(element: ElementKind): number {
    return this.counts[element];
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  /**
   * Gets a copy of the array stored under a key.
   *
   * @param key - Dotted key.
   * @returns A copy of the stored values.
   * @throws {KeyNotFoundError} If nothing is stored under the key.
   */
  get(key: string): PropertyArray {
    const values = this.data.get(key);
    if (values === undefined) {
      throw new KeyNotFoundError(key);
    }
    return values.slice();
  }

  /**
   * Stores values under a key, broadcasting scalars.
   *
   * @param key - Dotted key; its element segment fixes the array length.
   * @param values - Values to store.
   * @throws {InvalidPropertyKeyError} If the key cannot be parsed.
   * @throws {ArrayLengthMismatchError} If the array length is wrong.
   */
  set(key: string, values: PropertyValues): void {
    const { element } = parseKey(key);
    this.data.set(key, broadcast(key, values, this.count(element)));
  }

  delete(key: string): boolean {
    return this.data.delete(key);
  }

  /**
   * Lists stored keys in sorted order.
   *
   * @returns Sorted keys.
   */
  keys(): string[] {
    return [...this.data.keys()].sort();
  }
}
