import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { DEFAULT_MOCK_CONFIG, resolveMockConfig } from '../options.js';

describe('resolveMockConfig', () => {
  it('returns the defaults for an empty config', () => {
    expect(resolveMockConfig().unwrap()).toEqual({
      seed: 424242,
      consistentResponses: true,
      cacheEnabled: true,
      cacheTtl: 300,
      preferExamples: false,
      maxDepth: 12,
    });
    expect(Object.isFrozen(DEFAULT_MOCK_CONFIG)).toBe(true);
  });

  it('overlays user values and skips undefined ones', () => {
    const config = resolveMockConfig({ seed: 1, cacheTtl: undefined, maxDepth: 3 }).unwrap();
    expect(config.seed).toBe(1);
    expect(config.cacheTtl).toBe(300);
    expect(config.maxDepth).toBe(3);
  });

  it.each([
    [{ seed: -1 }, 'seed'],
    [{ seed: 1.5 }, 'seed'],
    [{ cacheTtl: 29 }, 'cacheTtl'],
    [{ cacheTtl: 86401 }, 'cacheTtl'],
    [{ maxDepth: 0 }, 'maxDepth'],
  ])('rejects %o', (config, setting) => {
    const result = resolveMockConfig(config);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.setting).toBe(setting);
    }
  });

  it('accepts both TTL bounds', () => {
    expect(resolveMockConfig({ cacheTtl: 30 }).isOk()).toBe(true);
    expect(resolveMockConfig({ cacheTtl: 86400 }).isOk()).toBe(true);
  });
});
