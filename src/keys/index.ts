/**
 * Property key module.
 *
 * @packageDocumentation
 */

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
} from './property-key.js';
export type { ElementKind, KeyLike, PropertyKey } from './property-key.js';
