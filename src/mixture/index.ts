/**
 * Mixture module: composite phases built from pure components.
 *
 * @packageDocumentation
 */

export { Mixture } from './mixture.js';
export type { MixtureOptions } from './mixture.js';
export {
  AlreadyOwnedByComponentError,
  CompositionNotNormalizedError,
  InsufficientConcentrationDataError,
  MissingComponentPropertyError,
  NotInMixtureError,
  NotInProjectError,
} from './errors.js';
export { CONCENTRATION, ComponentRegistry, MOLE_FRACTION, componentName } from './registry.js';
export { CompositionReconciler } from './reconciler.js';
export type { ReconcilerOptions } from './reconciler.js';
export { Interleaver, nonUnityIndices } from './interleave.js';
export type { InterleaverOptions } from './interleave.js';
export { KeyResolver } from './resolver.js';
export type { KeyResolverOptions } from './resolver.js';
export { assertNotOwnedByComponent, componentOwnedKeys, listMixtureProps } from './ownership.js';
export { checkHealth } from './health.js';
export type { HealthReport } from './health.js';
export { SUMMARY_RULE, formatMixture } from './formatter.js';
