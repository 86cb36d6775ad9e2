import { beforeEach, describe, expect, it } from 'vitest';
import { DuplicateNameError, InvalidNameError, NotFoundError, Phase, Project } from './index.js';

describe('Project', () => {
  let project: Project;

  beforeEach(() => {
    project = new Project({ pore: 4, throat: 3 });
  });

  describe('register and resolve', () => {
    it('should resolve a phase by name', () => {
      const water = new Phase({ project, name: 'water' });
      expect(project.resolve('water')).toBe(water);
      expect(project.names()).toEqual(['water']);
    });

    it('should throw NotFoundError for unknown names', () => {
      expect(() => project.resolve('air')).toThrow(NotFoundError);
      expect(() => project.resolve('air')).toThrow("No object named 'air' in project");
    });

    it('should reject duplicate names', () => {
      new Phase({ project, name: 'water' });
      expect(() => new Phase({ project, name: 'water' })).toThrow(DuplicateNameError);
    });

    it('should reject names that cannot qualify a key', () => {
      expect(() => new Phase({ project, name: 'all' })).toThrow(InvalidNameError);
      expect(() => new Phase({ project, name: 'h2.o' })).toThrow(
        "Invalid object name 'h2.o': name must not contain dots"
      );
      expect(() => new Phase({ project, name: '' })).toThrow(InvalidNameError);
    });

    it('should forget purged phases', () => {
      new Phase({ project, name: 'water' });
      expect(project.purge('water')).toBe(true);
      expect(project.contains('water')).toBe(false);
    });
  });

  describe('contains', () => {
    it('should accept a registered object or its name', () => {
      const water = new Phase({ project, name: 'water' });
      expect(project.contains(water)).toBe(true);
      expect(project.contains('water')).toBe(true);
    });

    it('should reject an object from another project with the same name', () => {
      new Phase({ project, name: 'water' });
      const other = new Phase({ project: new Project({ pore: 4, throat: 3 }), name: 'water' });
      expect(project.contains(other)).toBe(false);
    });
  });

  describe('generateName', () => {
    it('should number names from 01 and skip taken ones', () => {
      expect(project.generateName('mix')).toBe('mix_01');
      new Phase({ project, name: 'mix_01' });
      expect(project.generateName('mix')).toBe('mix_02');
    });

    it('should name phases without an explicit name', () => {
      const first = new Phase({ project });
      const second = new Phase({ project, prefix: 'gas' });
      expect(first.name).toBe('phase_01');
      expect(second.name).toBe('gas_01');
    });
  });
});

describe('Phase', () => {
  it('should size arrays from its project and list its properties', () => {
    const project = new Project({ pore: 2, throat: 1 });
    const air = new Phase({ project, name: 'air' });
    air.set('pore.density', 1.2);
    air.set('throat.density', 1.2);

    expect(Array.from(air.get('pore.density'))).toEqual([1.2, 1.2]);
    expect(air.count('throat')).toBe(1);
    expect(air.has('pore.density')).toBe(true);
    expect(air.props()).toEqual(['pore.density', 'throat.density']);
    expect([...air.listProperties()]).toEqual(['pore.density', 'throat.density']);
  });
});
