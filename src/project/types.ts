/**
 * Types shared by phase objects and the project namespace.
 *
 * @packageDocumentation
 */

import type { PropertyArray } from '../store/index.js';

/**
 * A phase object that can be looked up by name and read by key.
 *
 * @remarks
 * Pure phases and mixtures both satisfy this interface, so either can be a
 * component of a mixture. Readers treat it as read-only.
 */
export interface ComponentPhase {
  /** Unique name within the owning project. */
  readonly name: string;
  /**
   * Reads the array stored under a dotted key.
   *
   * @throws {KeyNotFoundError} If the phase has no such property.
   */
  get(key: string): PropertyArray;
  /** Every key the phase stores. */
  listProperties(): ReadonlySet<string>;
}

/**
 * A component given as the phase object or its name.
 */
export type ComponentRef = ComponentPhase | string;

/**
 * Error thrown when a name is not registered in a project.
 */
export class NotFoundError extends Error {
  /** The name that was looked up. */
  public readonly objectName: string;

  constructor(objectName: string) {
    super(`No object named '${objectName}' in project`);
    this.name = 'NotFoundError';
    this.objectName = objectName;
  }
}

/**
 * Error thrown when registering a name that is already taken.
 */
export class DuplicateNameError extends Error {
  /** The name that is already registered. */
  public readonly objectName: string;

  constructor(objectName: string) {
    super(`An object named '${objectName}' already exists in project`);
    this.name = 'DuplicateNameError';
    this.objectName = objectName;
  }
}

/**
 * Error thrown when a name cannot be used as a key qualifier.
 */
export class InvalidNameError extends Error {
  /** The rejected name. */
  public readonly objectName: string;

  constructor(objectName: string, reason: string) {
    super(`Invalid object name '${objectName}': ${reason}`);
    this.name = 'InvalidNameError';
    this.objectName = objectName;
  }
}
