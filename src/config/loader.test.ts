import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  EnvCoercionError,
  loadConfig,
} from './index.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pore-mixture-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return defaults when the file does not exist', async () => {
    const config = await loadConfig(join(dir, 'missing.toml'), {});
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should read the file and apply environment overrides on top', async () => {
    const file = join(dir, 'pore-mixture.toml');
    await writeFile(file, '[mixture]\nname_prefix = "blend"\n[logging]\nlevel = "info"\n');

    const config = await loadConfig(file, { PORE_MIXTURE_LOG_LEVEL: 'error' });

    expect(config.mixture.name_prefix).toBe('blend');
    expect(config.logging.level).toBe('error');
  });

  it('should surface parse errors', async () => {
    const file = join(dir, 'broken.toml');
    await writeFile(file, '[composition\n');

    await expect(loadConfig(file, {})).rejects.toBeInstanceOf(ConfigParseError);
  });

  it('should wrap read errors other than a missing file', async () => {
    await expect(loadConfig(dir, {})).rejects.toBeInstanceOf(ConfigParseError);
  });

  it('should validate the effective configuration', async () => {
    await expect(
      loadConfig(join(dir, 'missing.toml'), { PORE_MIXTURE_UNITY_TOLERANCE: '2' })
    ).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should surface environment coercion errors', async () => {
    await expect(
      loadConfig(join(dir, 'missing.toml'), { PORE_MIXTURE_WARN_OUT_OF_RANGE: 'perhaps' })
    ).rejects.toBeInstanceOf(EnvCoercionError);
  });
});
