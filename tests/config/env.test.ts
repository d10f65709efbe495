import { afterEach, describe, it, expect, vi } from 'vitest';

import { env, parseEnvironment, parseRuntime } from '../../src/config/env.js';

describe('Environment configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('applies defaults', () => {
    const parsed = parseEnvironment({});

    expect(parsed).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      IMAGE_HASH_MODE: 'hex',
      IMAGE_HASH_ALGORITHM: 'difference',
      IMAGE_HASH_DISTANCE_STRATEGY: 'popcount',
      IMAGE_HASH_SIMILARITY_THRESHOLD: 10,
      isDevelopment: true,
      isProduction: false,
      isTest: false
    });
  });

  it('reads hashing settings', () => {
    const parsed = parseEnvironment({
      NODE_ENV: 'production',
      IMAGE_HASH_MODE: 'dec',
      IMAGE_HASH_ALGORITHM: 'perceptual',
      IMAGE_HASH_DISTANCE_STRATEGY: 'bitwise',
      IMAGE_HASH_SIMILARITY_THRESHOLD: '5'
    });

    expect(parsed.IMAGE_HASH_MODE).toBe('dec');
    expect(parsed.IMAGE_HASH_ALGORITHM).toBe('perceptual');
    expect(parsed.IMAGE_HASH_DISTANCE_STRATEGY).toBe('bitwise');
    expect(parsed.IMAGE_HASH_SIMILARITY_THRESHOLD).toBe(5);
    expect(parsed.isProduction).toBe(true);
  });

  it('rejects an unknown mode', () => {
    expect(() => parseEnvironment({ IMAGE_HASH_MODE: 'oct' })).toThrow(
      /^Environment validation failed:\nIMAGE_HASH_MODE: /
    );
  });

  it('rejects thresholds beyond the hash width', () => {
    expect(() => parseEnvironment({ IMAGE_HASH_SIMILARITY_THRESHOLD: '65' })).toThrow(
      'IMAGE_HASH_SIMILARITY_THRESHOLD'
    );
  });

  it('loads the test environment', () => {
    expect(env.isTest).toBe(true);
    expect(env.LOG_LEVEL).toBe('silent');
  });

  it('accepts host environments it does not know', () => {
    const runtime = parseRuntime({ NODE_ENV: 'staging', LOG_LEVEL: 'loud' });

    expect(runtime).toEqual({
      NODE_ENV: 'staging',
      LOG_LEVEL: 'info',
      isDevelopment: false,
      isProduction: false,
      isTest: false
    });
  });

  it('imports the library under an unfamiliar host environment', async () => {
    vi.stubEnv('NODE_ENV', 'staging');
    vi.stubEnv('LOG_LEVEL', 'loud');
    vi.stubEnv('IMAGE_HASH_MODE', 'oct');
    vi.resetModules();

    const library = await import('../../src/index.js');
    const config = await import('../../src/config/env.js');

    expect(config.env.NODE_ENV).toBe('staging');
    expect(config.env.LOG_LEVEL).toBe('info');
    expect(() => library.createImageHasher()).toThrow(
      /^Environment validation failed:\nIMAGE_HASH_MODE: /
    );
  });
});
