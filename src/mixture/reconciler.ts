/**
 * Composition reconciler.
 *
 * Keeps per-component mole fraction and concentration arrays and the
 * aggregate `<element>.mole_fraction.all` consistent. Two update strategies
 * are offered as separate operations:
 *
 * - {@link CompositionReconciler.recomputeFromFreeComponent} back-solves the
 *   single component whose mole fraction is unset, falling back to
 *   concentrations when there is no single free component.
 * - {@link CompositionReconciler.recomputeFromConcentrations} always derives
 *   mole fractions from concentrations and requires all of them.
 *
 * Unset values are NaN.
 *
 * @packageDocumentation
 */

import { AGGREGATE_QUALIFIER, ELEMENT_KINDS, qualifiedKey } from '../keys/index.js';
import type { ElementKind } from '../keys/index.js';
import { broadcast, filledArray } from '../store/index.js';
import type { PropertyArray, PropertyStore, PropertyValues } from '../store/index.js';
import type { ComponentRef } from '../project/index.js';
import type { DiagnosticsChannel, Finding } from '../diagnostics/index.js';
import { InsufficientConcentrationDataError } from './errors.js';
import { assertNotOwnedByComponent } from './ownership.js';
import { CONCENTRATION, MOLE_FRACTION, componentName } from './registry.js';
import type { ComponentRegistry } from './registry.js';

/**
 * Options for creating a reconciler.
 */
export interface ReconcilerOptions {
  /** The mixture's own store. */
  store: PropertyStore;
  /** The mixture's components. */
  registry: ComponentRegistry;
  /** Channel receiving advisory findings. */
  diagnostics: DiagnosticsChannel;
  /** Record a finding when a mole fraction outside [0, 1] is set (default: true). */
  warnOutOfRange?: boolean;
}

function isEmpty(values: PropertyValues): boolean {
  return typeof values !== 'number' && values.length === 0;
}

function outOfRangeIndices(values: PropertyArray): number[] {
  const indices: number[] = [];
  values.forEach((value, index) => {
    if (value < 0 || value > 1) {
      indices.push(index);
    }
  });
  return indices;
}

/**
 * Adds `addend` into `target` element-wise.
 */
function accumulate(target: PropertyArray, addend: PropertyArray): void {
  target.forEach((value, index) => {
    target[index] = value + (addend[index] ?? Number.NaN);
  });
}

/**
 * Maintains mole fractions, concentrations and their aggregate.
 */
export class CompositionReconciler {
  private readonly store: PropertyStore;
  private readonly registry: ComponentRegistry;
  private readonly diagnostics: DiagnosticsChannel;
  private readonly warnOutOfRange: boolean;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.diagnostics = options.diagnostics;
    this.warnOutOfRange = options.warnOutOfRange ?? true;
  }

  /**
   * Reads a component's mole fraction. The mixture's own
   * `<element>.mole_fraction.<name>` wins; otherwise the component's
   * `<element>.mole_fraction` is used.
   *
   * @param name - Component name.
   * @param element - Element kind.
   * @returns The value found, or an unset array when neither holds one.
   */
  readMoleFraction(name: string, element: ElementKind): PropertyArray {
    return (
      this.readComposition(name, element, MOLE_FRACTION) ??
      filledArray(this.store.count(element), Number.NaN)
    );
  }

  /**
   * Marks a newly added component's mole fractions as unset for every
   * element kind that has no value yet.
   *
   * @param name - Component name.
   */
  seedComponent(name: string): void {
    for (const element of ELEMENT_KINDS) {
      const key = qualifiedKey(element, MOLE_FRACTION, name);
      if (!this.store.has(key)) {
        this.write(key, Number.NaN);
      }
    }
  }

  /**
   * Sets a component's concentration and marks every mole fraction of that
   * element kind unset. An empty array changes nothing.
   *
   * @param ref - Component object or name.
   * @param values - Scalar or per-instance concentrations.
   * @param element - Element kind (default: 'pore').
   * @returns Findings recorded by this operation.
   * @throws {NotInProjectError} If the component is not in the project.
   * @throws {NotInMixtureError} If the component is not in the mixture.
   */
  setConcentration(
    ref: ComponentRef,
    values: PropertyValues,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    const mark = this.diagnostics.mark();
    this.registry.resolve(ref);

    if (!isEmpty(values)) {
      this.write(qualifiedKey(element, CONCENTRATION, componentName(ref)), values);
      this.resetMoleFractions(element);
      this.recomputeAggregate(element);
    }

    return this.diagnostics.since(mark);
  }

  /**
   * Sets a component's mole fraction without touching any other array,
   * then recomputes the aggregate. An empty array skips the write.
   *
   * @param ref - Component object or name.
   * @param values - Scalar or per-instance mole fractions.
   * @param element - Element kind (default: 'pore').
   * @returns Findings recorded by this operation.
   * @throws {NotInProjectError} If the component is not in the project.
   * @throws {NotInMixtureError} If the component is not in the mixture.
   */
  setMoleFraction(
    ref: ComponentRef,
    values: PropertyValues,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    const mark = this.diagnostics.mark();
    this.registry.resolve(ref);
    const name = componentName(ref);

    if (!isEmpty(values)) {
      const key = qualifiedKey(element, MOLE_FRACTION, name);
      const array = broadcast(key, values, this.store.count(element));
      const outOfRange = outOfRangeIndices(array);
      if (this.warnOutOfRange && outOfRange.length > 0) {
        this.diagnostics.record({
          code: 'mole_fraction_out_of_range',
          severity: 'warning',
          message: 'Received values contain mole fractions outside the range of 0 -> 1',
          element,
          component: name,
          indices: outOfRange,
        });
      }
      this.write(key, array);
    }

    this.recomputeAggregate(element);
    return this.diagnostics.since(mark);
  }

  /**
   * Marks every component's mole fraction for an element kind unset.
   *
   * @param element - Element kind.
   */
  resetMoleFractions(element: ElementKind): void {
    for (const name of this.registry.getNames()) {
      this.write(qualifiedKey(element, MOLE_FRACTION, name), Number.NaN);
    }
  }

  /**
   * Back-solves the single free component so mole fractions sum to one.
   *
   * A released component is marked unset first. When exactly one component
   * has unset values its mole fraction becomes one minus the sum of the
   * others. Otherwise mole fractions are derived from concentrations.
   *
   * @param released - Component to treat as free.
   * @param element - Element kind (default: 'pore').
   * @returns Findings recorded by this operation.
   * @throws {InsufficientConcentrationDataError} If the concentration fallback lacks data.
   */
  recomputeFromFreeComponent(
    released?: ComponentRef,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    const mark = this.diagnostics.mark();

    if (released !== undefined) {
      this.registry.resolve(released);
      this.write(qualifiedKey(element, MOLE_FRACTION, componentName(released)), Number.NaN);
    }

    const names = this.registry.getNames();
    const unset = names.filter((name) =>
      this.readMoleFraction(name, element).some((value) => Number.isNaN(value))
    );
    const [free] = unset;

    if (unset.length === 1 && free !== undefined) {
      const solved = filledArray(this.store.count(element), 1);
      for (const name of names) {
        if (name === free) {
          continue;
        }
        const fraction = this.readMoleFraction(name, element);
        solved.forEach((value, index) => {
          solved[index] = value - (fraction[index] ?? Number.NaN);
        });
      }
      this.write(qualifiedKey(element, MOLE_FRACTION, free), solved);
    } else {
      this.diagnostics.record({
        code: 'free_component_fallback',
        severity: 'info',
        message: `${String(unset.length)} components have unset mole fractions; deriving them from concentrations`,
        element,
      });
      this.normalizeConcentrations(element);
    }

    this.recomputeAggregate(element);
    return this.diagnostics.since(mark);
  }

  /**
   * Derives every mole fraction from concentrations.
   *
   * @param element - Element kind (default: 'pore').
   * @returns Findings recorded by this operation.
   * @throws {InsufficientConcentrationDataError} If any component has no concentration.
   */
  recomputeFromConcentrations(element: ElementKind = 'pore'): readonly Finding[] {
    const mark = this.diagnostics.mark();
    this.normalizeConcentrations(element);
    this.recomputeAggregate(element);
    return this.diagnostics.since(mark);
  }

  /**
   * Recomputes `<element>.mole_fraction.all` as the sum of every
   * component's mole fraction.
   *
   * @param element - Element kind (default: 'pore').
   * @returns The new aggregate.
   */
  recomputeAggregate(element: ElementKind = 'pore'): PropertyArray {
    const total = filledArray(this.store.count(element), 0);
    for (const name of this.registry.getNames()) {
      accumulate(total, this.readMoleFraction(name, element));
    }
    this.write(qualifiedKey(element, MOLE_FRACTION, AGGREGATE_QUALIFIER), total);
    return total;
  }

  private normalizeConcentrations(element: ElementKind): void {
    const concentrations = new Map<string, PropertyArray>();
    const missing: string[] = [];
    for (const name of this.registry.getNames()) {
      const concentration = this.readComposition(name, element, CONCENTRATION);
      if (concentration === undefined) {
        missing.push(name);
      } else {
        concentrations.set(name, concentration);
      }
    }
    if (missing.length > 0) {
      throw new InsufficientConcentrationDataError(element, missing);
    }

    const density = filledArray(this.store.count(element), 0);
    for (const concentration of concentrations.values()) {
      accumulate(density, concentration);
    }

    for (const [name, concentration] of concentrations) {
      const fraction = concentration.map((value, index) => value / (density[index] ?? Number.NaN));
      this.write(qualifiedKey(element, MOLE_FRACTION, name), fraction);
    }
  }

  /**
   * Looks up `<element>.<property>.<name>` on the mixture, then
   * `<element>.<property>` on the component itself.
   */
  private readComposition(
    name: string,
    element: ElementKind,
    property: string
  ): PropertyArray | undefined {
    const own = qualifiedKey(element, property, name);
    if (this.store.has(own)) {
      return this.store.get(own);
    }

    const dotted = `${element}.${property}`;
    const component = this.registry.resolve(name);
    if (!component.listProperties().has(dotted)) {
      return undefined;
    }
    return broadcast(`${dotted}.${name}`, component.get(dotted), this.store.count(element));
  }

  private write(key: string, values: PropertyValues): void {
    assertNotOwnedByComponent(key, this.store, this.registry);
    this.store.set(key, values);
  }
}
