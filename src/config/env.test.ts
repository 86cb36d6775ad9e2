import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  DEFAULT_CONFIG,
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read every supported variable', () => {
      const result = readEnvOverrides({
        PORE_MIXTURE_NAME_PREFIX: 'blend',
        PORE_MIXTURE_UNITY_TOLERANCE: '1e-6',
        PORE_MIXTURE_WARN_OUT_OF_RANGE: 'off',
        PORE_MIXTURE_LOG_LEVEL: 'DEBUG',
      });

      expect(result.overrides).toEqual({
        mixture: { name_prefix: 'blend' },
        composition: { unity_tolerance: 1e-6, warn_out_of_range: false },
        logging: { level: 'debug' },
      });
      expect(result.appliedVars).toEqual([
        'PORE_MIXTURE_NAME_PREFIX',
        'PORE_MIXTURE_UNITY_TOLERANCE',
        'PORE_MIXTURE_WARN_OUT_OF_RANGE',
        'PORE_MIXTURE_LOG_LEVEL',
      ]);
      expect(result.errors).toEqual([]);
    });

    it('should ignore unset and empty variables', () => {
      const result = readEnvOverrides({ PORE_MIXTURE_NAME_PREFIX: '', OTHER: 'x' });
      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for non-numeric tolerances', () => {
      expect(() => readEnvOverrides({ PORE_MIXTURE_UNITY_TOLERANCE: 'tiny' })).toThrow(
        EnvCoercionError
      );
    });

    it('should reject whitespace-only numbers', () => {
      expect(() => readEnvOverrides({ PORE_MIXTURE_UNITY_TOLERANCE: '   ' })).toThrow(
        "Empty value for 'PORE_MIXTURE_UNITY_TOLERANCE'"
      );
    });

    it('should collect coercion errors when asked', () => {
      const result = readEnvOverrides(
        {
          PORE_MIXTURE_WARN_OUT_OF_RANGE: 'maybe',
          PORE_MIXTURE_LOG_LEVEL: 'loud',
          PORE_MIXTURE_NAME_PREFIX: 'blend',
        },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.envVar)).toEqual([
        'PORE_MIXTURE_WARN_OUT_OF_RANGE',
        'PORE_MIXTURE_LOG_LEVEL',
      ]);
      expect(result.appliedVars).toEqual(['PORE_MIXTURE_NAME_PREFIX']);
    });

    it('should coerce any finite number string', () => {
      fc.assert(
        fc.property(
          fc.double({ noNaN: true, noDefaultInfinity: true }).filter((num) => !Object.is(num, -0)),
          (num) => {
            const result = readEnvOverrides({ PORE_MIXTURE_UNITY_TOLERANCE: String(num) });
            expect(result.overrides.composition?.unity_tolerance).toBe(num);
          }
        )
      );
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let environment values win over the config', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, { PORE_MIXTURE_LOG_LEVEL: 'silent' });

      expect(config.logging.level).toBe('silent');
      expect(config.composition).toEqual(DEFAULT_CONFIG.composition);
      expect(config.mixture).toEqual(DEFAULT_CONFIG.mixture);
    });

    it('should not mutate the base configuration', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { PORE_MIXTURE_NAME_PREFIX: 'blend' });
      expect(DEFAULT_CONFIG.mixture.name_prefix).toBe('mix');
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable with its type', () => {
      const docs = getEnvVarDocumentation();
      expect(Object.keys(docs)).toEqual([
        'PORE_MIXTURE_NAME_PREFIX',
        'PORE_MIXTURE_UNITY_TOLERANCE',
        'PORE_MIXTURE_WARN_OUT_OF_RANGE',
        'PORE_MIXTURE_LOG_LEVEL',
      ]);
      expect(docs.PORE_MIXTURE_LOG_LEVEL?.type).toBe('log level');
    });
  });
});
