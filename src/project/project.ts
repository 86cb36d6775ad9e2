/**
 * Project namespace for phase objects.
 *
 * A project owns the element counts of its network and a flat namespace of
 * uniquely named phases. Mixtures hold component names and re-resolve them
 * here on every access.
 *
 * @packageDocumentation
 */

import { AGGREGATE_QUALIFIER } from '../keys/index.js';
import type { ElementKind } from '../keys/index.js';
import type { ElementCounts } from '../store/index.js';
import { DuplicateNameError, InvalidNameError, NotFoundError } from './types.js';
import type { ComponentPhase, ComponentRef } from './types.js';

/**
 * Namespace of phases sharing one network.
 *
 * @example
 * ```typescript
 * const project = new Project({ pore: 10, throat: 20 });
 * const water = new Phase({ project, name: 'water' });
 * project.resolve('water') === water; // true
 * ```
 */
export class Project {
  private readonly counts: ElementCounts;
  private readonly objects = new Map<string, ComponentPhase>();

  /**
   * Creates an empty project.
   *
   * @param counts - Instance counts of the network's element kinds.
   */
  constructor(counts: ElementCounts) {
    this.counts = { ...counts };
  }

  /**
   * Gets the instance counts of every element kind.
   *
   * @returns The counts given at construction.
   */
  getCounts(): ElementCounts {
    return this.counts;
  }

  count(element: ElementKind): number {
    return this.counts[element];
  }

  /**
   * Adds a phase to the namespace.
   *
   * @param phase - The phase to register.
   * @throws {InvalidNameError} If the name is empty, contains a dot, or is reserved.
   * @throws {DuplicateNameError} If the name is already taken.
   */
  register(phase: ComponentPhase): void {
    if (phase.name === '') {
      throw new InvalidNameError(phase.name, 'name must not be empty');
    }
    if (phase.name.includes('.')) {
      throw new InvalidNameError(phase.name, 'name must not contain dots');
    }
    if (phase.name === AGGREGATE_QUALIFIER) {
      throw new InvalidNameError(phase.name, `'${AGGREGATE_QUALIFIER}' is reserved`);
    }
    if (this.objects.has(phase.name)) {
      throw new DuplicateNameError(phase.name);
    }
    this.objects.set(phase.name, phase);
  }

  /**
   * Removes a phase from the namespace.
   *
   * @param name - Name of the phase.
   * @returns True if a phase was removed.
   */
  purge(name: string): boolean {
    return this.objects.delete(name);
  }

  /**
   * Looks up a phase by name.
   *
   * @param name - The phase name.
   * @returns The registered phase.
   * @throws {NotFoundError} If no phase has that name.
   */
  resolve(name: string): ComponentPhase {
    const phase = this.objects.get(name);
    if (phase === undefined) {
      throw new NotFoundError(name);
    }
    return phase;
  }

  /**
   * Checks membership. A phase object is a member only if it is the very
   * object registered under its name.
   *
   * @param ref - Phase object or name.
   * @returns True if the reference belongs to this project.
   */
  contains(ref: ComponentRef): boolean {
    if (typeof ref === 'string') {
      return this.objects.has(ref);
    }
    return this.objects.get(ref.name) === ref;
  }

  names(): string[] {
    return [...this.objects.keys()];
  }

  /**
   * Generates the first free name of the form `<prefix>_NN`.
   *
   * @param prefix - Name prefix.
   * @returns An unused name.
   */
  generateName(prefix: string): string {
    let index = 1;
    let candidate = `${prefix}_${String(index).padStart(2, '0')}`;
    while (this.objects.has(candidate)) {
      index++;
      candidate = `${prefix}_${String(index).padStart(2, '0')}`;
    }
    return candidate;
  }
}
