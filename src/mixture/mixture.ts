/**
 * Mixture: a multi-component fluid phase composed of pure-component phases.
 *
 * @packageDocumentation
 */

import { AGGREGATE_QUALIFIER, ELEMENT_KINDS, qualifiedKey, toPropertyKey } from '../keys/index.js';
import type { ElementKind, KeyLike } from '../keys/index.js';
import { PropertyStore } from '../store/index.js';
import type { PropertyArray, PropertyValues } from '../store/index.js';
import type { ComponentPhase, ComponentRef, Project } from '../project/index.js';
import { DiagnosticsChannel } from '../diagnostics/index.js';
import type { Finding } from '../diagnostics/index.js';
import { createLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { DEFAULT_CONFIG, assertConfigValid } from '../config/index.js';
import type { Config } from '../config/index.js';
import { NotInProjectError } from './errors.js';
import { checkHealth } from './health.js';
import type { HealthReport } from './health.js';
import { Interleaver } from './interleave.js';
import { CompositionReconciler } from './reconciler.js';
import { ComponentRegistry, MOLE_FRACTION, componentName } from './registry.js';
import { KeyResolver } from './resolver.js';

/**
 * Options for creating a mixture.
 */
export interface MixtureOptions {
  /** Project the mixture and its components belong to. */
  project: Project;
  /** Unique name. Generated from `config.mixture.name_prefix` when omitted. */
  name?: string;
  /** Components to add on construction. */
  components?: readonly ComponentRef[];
  /** Settings (default: built-in defaults). */
  config?: Config;
  /** Logger receiving findings (default: a stderr logger at `config.logging.level`). */
  logger?: Logger;
}

/**
 * A fluid mixture built from component phases.
 *
 * Reads resolve from the mixture's own store, then the component named by
 * the key's qualifier, then a mole-fraction weighted blend of all components.
 *
 * @example
 * ```typescript
 * const project = new Project({ pore: 2, throat: 1 });
 * const water = new Phase({ project, name: 'water' });
 * const air = new Phase({ project, name: 'air' });
 * const mix = new Mixture({ project, components: [water, air] });
 *
 * mix.setMoleFraction(water, 0.9);
 * mix.recomputeFromFreeComponent();
 * mix.get('pore.density'); // blended from water and air
 * ```
 */
export class Mixture implements ComponentPhase {
  readonly name: string;
  readonly project: Project;
  /** Advisory findings recorded by this mixture. */
  readonly diagnostics: DiagnosticsChannel;

  private readonly config: Config;
  private readonly store: PropertyStore;
  private readonly registry: ComponentRegistry;
  private readonly reconciler: CompositionReconciler;
  private readonly interleaver: Interleaver;
  private readonly resolver: KeyResolver;

  /**
   * Creates a mixture and registers it with its project.
   *
   * @param options - Mixture options.
   * @throws {ConfigValidationError} If the configuration fails validation.
   * @throws {DuplicateNameError} If the name is already used in the project.
   * @throws {NotInProjectError} If an initial component is not in the project.
   */
  constructor(options: MixtureOptions) {
    this.project = options.project;
    this.config = options.config ?? DEFAULT_CONFIG;
    assertConfigValid(this.config);
    this.name = options.name ?? options.project.generateName(this.config.mixture.name_prefix);

    const logger =
      options.logger ?? createLogger({ source: this.name, threshold: this.config.logging.level });
    this.diagnostics = new DiagnosticsChannel(logger);

    this.store = new PropertyStore(options.project.getCounts());
    this.registry = new ComponentRegistry(options.project, this.store, this.name);
    this.reconciler = new CompositionReconciler({
      store: this.store,
      registry: this.registry,
      diagnostics: this.diagnostics,
      warnOutOfRange: this.config.composition.warn_out_of_range,
    });
    this.interleaver = new Interleaver({
      store: this.store,
      registry: this.registry,
      reconciler: this.reconciler,
      unityTolerance: this.config.composition.unity_tolerance,
    });
    this.resolver = new KeyResolver({
      store: this.store,
      registry: this.registry,
      interleaver: this.interleaver,
      diagnostics: this.diagnostics,
    });

    options.project.register(this);

    for (const element of ELEMENT_KINDS) {
      this.store.set(qualifiedKey(element, MOLE_FRACTION, AGGREGATE_QUALIFIER), Number.NaN);
    }
    if (options.components !== undefined) {
      this.addComponents(options.components);
    }
  }

  /**
   * Reads a property from the mixture, a component, or a blend of components.
   *
   * @throws {KeyNotFoundError} If the key cannot be resolved.
   * @throws {CompositionNotNormalizedError} If a blend is needed and mole fractions are not unity.
   */
  get(key: KeyLike): PropertyArray {
    return this.resolver.get(key);
  }

  /**
   * Writes a property on the mixture.
   *
   * @throws {AlreadyOwnedByComponentError} If a component provides the key.
   */
  set(key: KeyLike, values: PropertyValues): void {
    this.resolver.set(key, values);
  }

  has(key: KeyLike): boolean {
    return this.resolver.has(key);
  }

  count(element: ElementKind): number {
    return this.store.count(element);
  }

  /**
   * Lists visible keys.
   *
   * @param deep - Include component properties suffixed with `.<component>`.
   * @returns Sorted keys.
   */
  props(deep = false): string[] {
    return this.resolver.props(deep);
  }

  listProperties(): ReadonlySet<string> {
    return new Set(this.store.keys());
  }

  /**
   * Adds components. Names already present are skipped; new ones get unset
   * mole fractions for every element kind.
   *
   * @param refs - Component(s) to add.
   * @returns Names that were added.
   * @throws {NotInProjectError} If any component is not in the project.
   */
  addComponents(refs: ComponentRef | readonly ComponentRef[]): string[] {
    const added = this.registry.add(refs);
    for (const name of added) {
      this.reconciler.seedComponent(name);
    }
    return added;
  }

  /**
   * Removes components and every key stored for them.
   *
   * @param refs - Component(s) to remove.
   * @throws {NotInMixtureError} If any component is not in the mixture.
   */
  removeComponents(refs: ComponentRef | readonly ComponentRef[]): void {
    this.registry.remove(refs);
  }

  /**
   * Gets the current components.
   *
   * @returns Components keyed by name, in the order they were added.
   */
  listComponents(): Map<string, ComponentPhase> {
    return this.registry.list();
  }

  /**
   * Replaces the component set: components not listed are removed, listed
   * ones not yet present are added.
   *
   * @param refs - The new component set.
   * @throws {NotInProjectError} If any listed component is not in the project.
   */
  setComponents(refs: readonly ComponentRef[]): void {
    for (const ref of refs) {
      if (!this.project.contains(ref)) {
        throw new NotInProjectError(componentName(ref));
      }
    }

    const keep = new Set(refs.map(componentName));
    const dropped = this.registry.getNames().filter((name) => !keep.has(name));
    if (dropped.length > 0) {
      this.registry.remove(dropped);
    }
    this.addComponents(refs);
  }

  setConcentration(
    ref: ComponentRef,
    values: PropertyValues,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    return this.reconciler.setConcentration(ref, values, element);
  }

  setMoleFraction(
    ref: ComponentRef,
    values: PropertyValues,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    return this.reconciler.setMoleFraction(ref, values, element);
  }

  /**
   * Back-solves the one component with unset mole fractions, falling back to
   * concentrations when there is none or several.
   *
   * @param released - Component to mark unset first.
   * @param element - Element kind (default: 'pore').
   * @returns Findings recorded by this operation.
   */
  recomputeFromFreeComponent(
    released?: ComponentRef,
    element: ElementKind = 'pore'
  ): readonly Finding[] {
    return this.reconciler.recomputeFromFreeComponent(released, element);
  }

  recomputeFromConcentrations(element: ElementKind = 'pore'): readonly Finding[] {
    return this.reconciler.recomputeFromConcentrations(element);
  }

  recomputeAggregate(element: ElementKind = 'pore'): PropertyArray {
    return this.reconciler.recomputeAggregate(element);
  }

  /**
   * Reports instances whose mole fractions do not sum to one.
   *
   * @param element - Element kind (default: 'pore').
   * @returns Index lists of low and high instances.
   */
  checkHealth(element: ElementKind = 'pore'): HealthReport {
    return checkHealth(this.reconciler, this.config.composition.unity_tolerance, element);
  }

  /**
   * Blends a property across all components by mole fraction, ignoring any
   * value stored on the mixture itself.
   *
   * @throws {CompositionNotNormalizedError} If mole fractions are not unity.
   * @throws {MissingComponentPropertyError} If a component lacks the key.
   */
  interleave(key: KeyLike): PropertyArray {
    return this.interleaver.interleave(toPropertyKey(key));
  }
}
