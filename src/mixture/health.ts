/**
 * Composition health check.
 *
 * @packageDocumentation
 */

import type { ElementKind } from '../keys/index.js';
import type { CompositionReconciler } from './reconciler.js';

/**
 * Instances whose aggregate mole fraction misses unity.
 */
export interface HealthReport {
  /** Element kind checked. */
  element: ElementKind;
  /** Indices where the aggregate is below 1 − tolerance. */
  tooLow: number[];
  /** Indices where the aggregate is above 1 + tolerance. */
  tooHigh: number[];
  /** True when both lists are empty. Unset (NaN) instances do not count. */
  healthy: boolean;
}

/**
 * Recomputes the aggregate and classifies every instance.
 *
 * @param reconciler - Reconciler of the mixture to check.
 * @param tolerance - Largest accepted |Σx − 1|.
 * @param element - Element kind (default: 'pore').
 * @returns The report. Never throws for composition problems.
 */
export function checkHealth(
  reconciler: CompositionReconciler,
  tolerance: number,
  element: ElementKind = 'pore'
): HealthReport {
  const aggregate = reconciler.recomputeAggregate(element);
  const tooLow: number[] = [];
  const tooHigh: number[] = [];

  aggregate.forEach((value, index) => {
    if (value < 1 - tolerance) {
      tooLow.push(index);
    } else if (value > 1 + tolerance) {
      tooHigh.push(index);
    }
  });

  return { element, tooLow, tooHigh, healthy: tooLow.length === 0 && tooHigh.length === 0 };
}
