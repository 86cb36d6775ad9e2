import { beforeEach, describe, expect, it } from 'vitest';
import { DiagnosticsChannel } from '../diagnostics/index.js';
import { parseKey } from '../keys/index.js';
import { Phase, Project } from '../project/index.js';
import { ArrayLengthMismatchError, PropertyStore } from '../store/index.js';
import type { ComponentPhase } from '../project/index.js';
import { CompositionNotNormalizedError, MissingComponentPropertyError } from './errors.js';
import { Interleaver, nonUnityIndices } from './interleave.js';
import { CompositionReconciler } from './reconciler.js';
import { ComponentRegistry } from './registry.js';

describe('nonUnityIndices', () => {
  it('should flag values beyond the tolerance and unset values', () => {
    const aggregate = new Float64Array([1, 0.9, NaN, 1 + 1e-12, 1.1]);
    expect(nonUnityIndices(aggregate, 1e-9)).toEqual([1, 2, 4]);
  });

  it('should accept everything within a loose tolerance', () => {
    expect(nonUnityIndices(new Float64Array([0.95, 1.05]), 0.1)).toEqual([]);
  });
});

describe('Interleaver', () => {
  let project: Project;
  let store: PropertyStore;
  let registry: ComponentRegistry;
  let reconciler: CompositionReconciler;
  let interleaver: Interleaver;
  let water: Phase;
  let air: Phase;

  beforeEach(() => {
    project = new Project({ pore: 2, throat: 1 });
    store = new PropertyStore(project.getCounts());
    registry = new ComponentRegistry(project, store, 'mix');
    reconciler = new CompositionReconciler({
      store,
      registry,
      diagnostics: new DiagnosticsChannel(),
    });
    interleaver = new Interleaver({ store, registry, reconciler, unityTolerance: 1e-9 });

    water = new Phase({ project, name: 'water' });
    air = new Phase({ project, name: 'air' });
    water.set('pore.density', [1000, 800]);
    air.set('pore.density', [1, 2]);
    registry.add([water, air]);
  });

  it('should weight each component by its mole fraction', () => {
    reconciler.setMoleFraction(water, 0.25);
    reconciler.setMoleFraction(air, 0.75);

    const density = interleaver.interleave(parseKey('pore.density'));

    expect(Array.from(density)).toEqual([250.75, 201.5]);
  });

  it('should use per-instance mole fractions', () => {
    reconciler.setMoleFraction(water, [1, 0.5]);
    reconciler.setMoleFraction(air, [0, 0.5]);

    expect(Array.from(interleaver.interleave(parseKey('pore.density')))).toEqual([1000, 401]);
  });

  it('should recompute the aggregate before blending', () => {
    reconciler.setMoleFraction(water, 0.5);
    reconciler.setMoleFraction(air, 0.5);
    store.set('pore.mole_fraction.all', 0);

    expect(Array.from(interleaver.interleave(parseKey('pore.density')))).toEqual([500.5, 401]);
    expect(Array.from(store.get('pore.mole_fraction.all'))).toEqual([1, 1]);
  });

  it('should not trust a unity aggregate left by an earlier update', () => {
    reconciler.setMoleFraction(water, 0.5);
    reconciler.setMoleFraction(air, 0.5);
    store.set('pore.mole_fraction.water', 0.75);

    expect(() => interleaver.interleave(parseKey('pore.density'))).toThrow(
      CompositionNotNormalizedError
    );
    expect(Array.from(store.get('pore.mole_fraction.all'))).toEqual([1.25, 1.25]);
  });

  it('should refuse to blend when mole fractions do not sum to one', () => {
    reconciler.setMoleFraction(water, [0.5, 0.6]);
    reconciler.setMoleFraction(air, 0.4);

    try {
      interleaver.interleave(parseKey('pore.density'));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CompositionNotNormalizedError);
      if (error instanceof CompositionNotNormalizedError) {
        expect(error.indices).toEqual([0]);
        expect(error.message).toBe('Mole fraction does not add to unity in all pores (1 offending)');
      }
    }
  });

  it('should treat unset mole fractions as not normalized', () => {
    expect(() => interleaver.interleave(parseKey('pore.density'))).toThrow(
      CompositionNotNormalizedError
    );
  });

  it('should name the components lacking the property', () => {
    reconciler.setMoleFraction(water, 0.5);
    reconciler.setMoleFraction(air, 0.5);

    expect(() => interleaver.interleave(parseKey('pore.viscosity'))).toThrow(
      "Cannot interleave 'pore.viscosity': missing on water, air"
    );
  });

  it('should report a mixture without components', () => {
    registry.remove([water, air]);
    expect(() => interleaver.interleave(parseKey('pore.density'))).toThrow(
      "Cannot interleave 'pore.density': mixture has no components"
    );
  });

  it('should reject component arrays of the wrong length', () => {
    const broken: ComponentPhase = {
      name: 'broken',
      get: () => new Float64Array([1, 2, 3]),
      listProperties: () => new Set(['pore.density']),
    };
    project.register(broken);
    registry.add(broken);
    reconciler.setMoleFraction(water, 0.5);
    reconciler.setMoleFraction(air, 0.5);
    reconciler.setMoleFraction(broken, 0);

    expect(() => interleaver.interleave(parseKey('pore.density'))).toThrow(
      ArrayLengthMismatchError
    );
  });

  it('should blend throat properties with throat mole fractions', () => {
    water.set('throat.diffusivity', 2);
    air.set('throat.diffusivity', 4);
    reconciler.setMoleFraction(water, 0.5, 'throat');
    reconciler.setMoleFraction(air, 0.5, 'throat');

    expect(Array.from(interleaver.interleave(parseKey('throat.diffusivity')))).toEqual([3]);
  });

  it('should surface missing properties as MissingComponentPropertyError', () => {
    reconciler.setMoleFraction(water, 1);
    reconciler.setMoleFraction(air, 0);
    air.set('pore.viscosity', 1);

    try {
      interleaver.interleave(parseKey('pore.viscosity'));
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingComponentPropertyError);
      if (error instanceof MissingComponentPropertyError) {
        expect(error.components).toEqual(['water']);
        expect(error.key).toBe('pore.viscosity');
      }
    }
  });
});
