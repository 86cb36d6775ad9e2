/**
 * Pure-component phase.
 *
 * @packageDocumentation
 */

import { PropertyStore } from '../store/index.js';
import type { ElementKind } from '../keys/index.js';
import type { PropertyArray, PropertyValues } from '../store/index.js';
import type { Project } from './project.js';
import type { ComponentPhase } from './types.js';

/**
 * Options for creating a phase.
 */
export interface PhaseOptions {
  /** Project the phase belongs to. */
  project: Project;
  /** Unique name. Generated from `prefix` when omitted. */
  name?: string;
  /** Prefix for generated names (default: 'phase'). */
  prefix?: string;
}

/**
 * A single-component fluid phase holding its own property arrays.
 *
 * @example
 * ```typescript
 * const water = new Phase({ project, name: 'water' });
 * water.set('pore.density', 998.2);
 * ```
 */
export class Phase implements ComponentPhase {
  readonly name: string;
  readonly project: Project;
  private readonly store: PropertyStore;

  /**
   * Creates a phase and registers it with its project.
   *
   * @param options - Phase options.
   * @throws {DuplicateNameError} If the name is already used in the project.
   */
  constructor(options: PhaseOptions) {
    this.project = options.project;
    this.name = options.name ?? options.project.generateName(options.prefix ?? 'phase');
    this.store = new PropertyStore(options.project.getCounts());
    options.project.register(this);
  }

  get(key: string): PropertyArray {
    return this.store.get(key);
  }

  set(key: string, values: PropertyValues): void {
    this.store.set(key, values);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  count(element: ElementKind): number {
    return this.store.count(element);
  }

  /**
   * Lists stored keys in sorted order.
   *
   * @returns Sorted keys.
   */
  props(): string[] {
    return this.store.keys();
  }

  listProperties(): ReadonlySet<string> {
    return new Set(this.store.keys());
  }
}
