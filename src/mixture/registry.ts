/**
 * Component registry for mixtures.
 *
 * Tracks which named phases make up a mixture. Only names are held; the
 * phase objects are looked up in the project on every access, so the same
 * phase can belong to several mixtures and a purged phase is never returned.
 *
 * @packageDocumentation
 */

import { AGGREGATE_QUALIFIER, ELEMENT_KINDS, qualifiedKey } from '../keys/index.js';
import type { Project, ComponentPhase, ComponentRef } from '../project/index.js';
import type { PropertyStore } from '../store/index.js';
import { NotInMixtureError, NotInProjectError } from './errors.js';

/**
 * Property name of mole fraction arrays.
 */
export const MOLE_FRACTION = 'mole_fraction';

/**
 * Property name of concentration arrays.
 */
export const CONCENTRATION = 'concentration';

/**
 * Gets the name a component reference points to.
 *
 * @param ref - Phase object or name.
 * @returns The component name.
 */
export function componentName(ref: ComponentRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

function isRefList(refs: ComponentRef | readonly ComponentRef[]): refs is readonly ComponentRef[] {
  return Array.isArray(refs);
}

function toList(refs: ComponentRef | readonly ComponentRef[]): readonly ComponentRef[] {
  return isRefList(refs) ? refs : [refs];
}

/**
 * Set of component names belonging to one mixture.
 */
export class ComponentRegistry {
  private readonly names = new Set<string>();
  private readonly project: Project;
  private readonly store: PropertyStore;
  private readonly mixtureName: string;

  /**
   * Creates an empty registry.
   *
   * @param project - Namespace components are resolved through.
   * @param store - The mixture's own property store, cleaned on removal.
   * @param mixtureName - Name of the owning mixture, for error messages.
   */
  constructor(project: Project, store: PropertyStore, mixtureName: string) {
    this.project = project;
    this.store = store;
    this.mixtureName = mixtureName;
  }

  get size(): number {
    return this.names.size;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Lists registered names in registration order.
   *
   * @returns Component names.
   */
  getNames(): string[] {
    return [...this.names];
  }

  /**
   * Registers one or more components. Names already present are skipped.
   *
   * @param refs - Component(s) to add.
   * @returns Names that were not registered before.
   * @throws {NotInProjectError} If any component is not in the project; nothing is added then.
   */
  add(refs: ComponentRef | readonly ComponentRef[]): string[] {
    const list = toList(refs);
    for (const ref of list) {
      this.assertInProject(ref);
    }

    const added: string[] = [];
    for (const ref of list) {
      const name = componentName(ref);
      if (!this.names.has(name)) {
        this.names.add(name);
        added.push(name);
      }
    }
    return added;
  }

  /**
   * Deregisters one or more components, deletes every stored key ending in
   * `.<name>`, and resets each element kind's aggregate mole fraction to unset.
   *
   * @param refs - Component(s) to remove.
   * @throws {NotInMixtureError} If any name is not registered; nothing is removed then.
   */
  remove(refs: ComponentRef | readonly ComponentRef[]): void {
    const names = toList(refs).map(componentName);
    for (const name of names) {
      if (!this.names.has(name)) {
        throw new NotInMixtureError(name, this.mixtureName);
      }
    }

    for (const name of names) {
      this.names.delete(name);
      for (const key of this.store.keys()) {
        if (key.endsWith(`.${name}`)) {
          this.store.delete(key);
        }
      }
    }

    for (const element of ELEMENT_KINDS) {
      this.store.set(qualifiedKey(element, MOLE_FRACTION, AGGREGATE_QUALIFIER), Number.NaN);
    }
  }

  /**
   * Resolves a registered component.
   *
   * @param ref - Phase object or name.
   * @returns The live phase object from the project.
   * @throws {NotInProjectError} If the component is not in the project.
   * @throws {NotInMixtureError} If the component is not registered here.
   */
  resolve(ref: ComponentRef): ComponentPhase {
    this.assertInProject(ref);
    const name = componentName(ref);
    if (!this.names.has(name)) {
      throw new NotInMixtureError(name, this.mixtureName);
    }
    return this.project.resolve(name);
  }

  /**
   * Maps every registered name to its live phase object.
   *
   * @returns Components keyed by name, in registration order.
   * @throws {NotInProjectError} If a registered component has left the project.
   */
  list(): Map<string, ComponentPhase> {
    const components = new Map<string, ComponentPhase>();
    for (const name of this.names) {
      this.assertInProject(name);
      components.set(name, this.project.resolve(name));
    }
    return components;
  }

  private assertInProject(ref: ComponentRef): void {
    if (!this.project.contains(ref)) {
      throw new NotInProjectError(componentName(ref));
    }
  }
}
