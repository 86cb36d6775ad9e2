import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigValidationError,
  DEFAULT_CONFIG,
  MAX_UNITY_TOLERANCE,
  assertConfigValid,
  mergeConfig,
  validateConfig,
} from './index.js';

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should pass the default configuration', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    it('should reject name prefixes that cannot qualify a key', () => {
      const config = mergeConfig(DEFAULT_CONFIG, { mixture: { name_prefix: 'my.mix' } });
      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.field).toBe('mixture.name_prefix');
      expect(result.errors[0]?.value).toBe('my.mix');
    });

    it('should reject negative and oversized tolerances', () => {
      for (const tolerance of [-1e-9, 0.5, Number.POSITIVE_INFINITY, Number.NaN]) {
        const config = mergeConfig(DEFAULT_CONFIG, { composition: { unity_tolerance: tolerance } });
        const result = validateConfig(config);
        expect(result.errors.map((e) => e.field)).toEqual(['composition.unity_tolerance']);
      }
    });

    it('should accept every tolerance in range', () => {
      fc.assert(
        fc.property(fc.double({ min: 0, max: MAX_UNITY_TOLERANCE, noNaN: true }), (tolerance) => {
          const config = mergeConfig(DEFAULT_CONFIG, {
            composition: { unity_tolerance: tolerance },
          });
          expect(validateConfig(config).valid).toBe(true);
        })
      );
    });

    it('should report every invalid field', () => {
      const config = mergeConfig(DEFAULT_CONFIG, {
        mixture: { name_prefix: '' },
        composition: { unity_tolerance: -1 },
      });
      expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
        'mixture.name_prefix',
        'composition.unity_tolerance',
      ]);
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid configuration', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should throw ConfigValidationError listing each failure', () => {
      const config = mergeConfig(DEFAULT_CONFIG, { composition: { unity_tolerance: 1 } });

      try {
        assertConfigValid(config);
        expect.unreachable('assertConfigValid should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(1);
          expect(error.message).toBe(
            'Configuration validation failed with 1 error(s):\n' +
              "  - composition.unity_tolerance: 'composition.unity_tolerance' must be between 0 and 0.01, got 1"
          );
        }
      }
    });
  });
});
