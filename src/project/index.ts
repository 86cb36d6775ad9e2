/**
 * Project namespace and pure phases.
 *
 * @packageDocumentation
 */

export { Project } from './project.js';
export { Phase } from './phase.js';
export type { PhaseOptions } from './phase.js';
export { DuplicateNameError, InvalidNameError, NotFoundError } from './types.js';
export type { ComponentPhase, ComponentRef } from './types.js';
