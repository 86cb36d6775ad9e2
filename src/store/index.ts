/**
 * Property store module.
 *
 * @packageDocumentation
 */

export {
  ArrayLengthMismatchError,
  KeyNotFoundError,
  PropertyStore,
  broadcast,
  filledArray,
} from './property-store.js';
export type { ElementCounts, PropertyArray, PropertyValues } from './property-store.js';
