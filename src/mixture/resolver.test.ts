import { beforeEach, describe, expect, it } from 'vitest';
import { DiagnosticsChannel } from '../diagnostics/index.js';
import { Phase, Project } from '../project/index.js';
import { KeyNotFoundError, PropertyStore } from '../store/index.js';
import { AlreadyOwnedByComponentError, CompositionNotNormalizedError } from './errors.js';
import { Interleaver } from './interleave.js';
import { CompositionReconciler } from './reconciler.js';
import { ComponentRegistry } from './registry.js';
import { KeyResolver } from './resolver.js';

describe('KeyResolver', () => {
  let project: Project;
  let store: PropertyStore;
  let diagnostics: DiagnosticsChannel;
  let reconciler: CompositionReconciler;
  let resolver: KeyResolver;
  let water: Phase;
  let air: Phase;

  beforeEach(() => {
    project = new Project({ pore: 2, throat: 1 });
    store = new PropertyStore(project.getCounts());
    const registry = new ComponentRegistry(project, store, 'mix');
    diagnostics = new DiagnosticsChannel();
    reconciler = new CompositionReconciler({ store, registry, diagnostics });
    const interleaver = new Interleaver({ store, registry, reconciler, unityTolerance: 1e-9 });
    resolver = new KeyResolver({ store, registry, interleaver, diagnostics });

    water = new Phase({ project, name: 'water' });
    air = new Phase({ project, name: 'air' });
    water.set('pore.density', 1000);
    air.set('pore.density', 1);
    registry.add([water, air]);
    reconciler.setMoleFraction(water, 0.5);
    reconciler.setMoleFraction(air, 0.5);
  });

  describe('get', () => {
    it('should prefer values stored on the mixture', () => {
      store.set('pore.density', 42);
      expect(Array.from(resolver.get('pore.density'))).toEqual([42, 42]);
    });

    it('should delegate component-qualified keys', () => {
      expect(Array.from(resolver.get('pore.density.water'))).toEqual([1000, 1000]);
      const parsed = { element: 'pore', property: 'density', qualifier: 'air' } as const;
      expect(Array.from(resolver.get(parsed))).toEqual([1, 1]);
    });

    it('should return copies of delegated arrays', () => {
      const values = resolver.get('pore.density.water');
      values[0] = 0;
      expect(Array.from(water.get('pore.density'))).toEqual([1000, 1000]);
    });

    it('should blend keys that are neither stored nor delegated', () => {
      expect(Array.from(resolver.get('pore.density'))).toEqual([500.5, 500.5]);
    });

    it('should degrade to KeyNotFoundError and record a finding when a blend is impossible', () => {
      expect(() => resolver.get('pore.viscosity')).toThrow(KeyNotFoundError);
      expect(diagnostics.getFindings()).toEqual([
        {
          code: 'interleave_degraded',
          severity: 'warning',
          message: "Cannot interleave 'pore.viscosity': missing on water, air",
          element: 'pore',
          key: 'pore.viscosity',
        },
      ]);
    });

    it('should continue to blending when the named component lacks the key', () => {
      expect(() => resolver.get('pore.viscosity.water')).toThrow(
        "Key 'pore.viscosity.water' not found"
      );
    });

    it('should not degrade composition errors', () => {
      reconciler.setMoleFraction(air, 0.4);
      expect(() => resolver.get('pore.density')).toThrow(CompositionNotNormalizedError);
      expect(diagnostics.getFindings()).toEqual([]);
    });
  });

  describe('set', () => {
    it('should store values on the mixture', () => {
      resolver.set('pore.temperature', 298);
      expect(Array.from(store.get('pore.temperature'))).toEqual([298, 298]);
    });

    it('should refuse keys a component already provides', () => {
      expect(() => resolver.set('pore.density.water', 1)).toThrow(AlreadyOwnedByComponentError);
      expect(() => resolver.set('pore.density.water', 1)).toThrow(
        "pore.density.water already assigned to component 'water'"
      );
    });

    it('should allow component-qualified keys the component does not provide', () => {
      resolver.set('pore.viscosity.water', 0.001);
      expect(Array.from(resolver.get('pore.viscosity.water'))).toEqual([0.001, 0.001]);
    });
  });

  describe('props', () => {
    it('should list own keys, or own and component keys when deep', () => {
      expect(resolver.props()).toEqual([
        'pore.mole_fraction.air',
        'pore.mole_fraction.all',
        'pore.mole_fraction.water',
      ]);
      expect(resolver.props(true)).toEqual([
        'pore.density.air',
        'pore.density.water',
        'pore.mole_fraction.air',
        'pore.mole_fraction.all',
        'pore.mole_fraction.water',
      ]);
    });

    it('should report stored and delegated keys through has', () => {
      expect(resolver.has('pore.density.water')).toBe(true);
      expect(resolver.has('pore.mole_fraction.all')).toBe(true);
      expect(resolver.has('pore.density')).toBe(false);
    });
  });
});
