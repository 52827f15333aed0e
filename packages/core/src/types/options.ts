/**
 * Mock generation configuration consumed by the coordinator.
 * Supplied ready-made; file and environment loading happen in the CLI.
 */

import { ConfigError } from './errors.js';
import { err, ok, type Result } from './result.js';

export interface MockConfig {
  /** Drives all determinism */
  seed: number;
  /** When false, every call varies and the cache is bypassed */
  consistentResponses: boolean;
  cacheEnabled: boolean;
  /** Entry lifetime in seconds */
  cacheTtl: number;
  /** Use a schema's example/examples before synthesizing a value */
  preferExamples: boolean;
  /** Nesting cap for arrays and objects */
  maxDepth: number;
}

export const CACHE_TTL_MIN = 30;
export const CACHE_TTL_MAX = 86400;

export const DEFAULT_MOCK_CONFIG: Readonly<MockConfig> = Object.freeze({
  seed: 424242,
  consistentResponses: true,
  cacheEnabled: true,
  cacheTtl: 300,
  preferExamples: false,
  maxDepth: 12,
});

/**
 * Merge user configuration over defaults and validate the result.
 */
export function resolveMockConfig(
  userConfig: Partial<MockConfig> = {}
): Result<MockConfig, ConfigError> {
  const resolved: MockConfig = { ...DEFAULT_MOCK_CONFIG };
  for (const [key, value] of Object.entries(userConfig)) {
    if (value !== undefined && key in resolved) {
      Object.assign(resolved, { [key]: value });
    }
  }

  const problem = validateMockConfig(resolved);
  return problem ? err(problem) : ok(resolved);
}

function validateMockConfig(config: MockConfig): ConfigError | undefined {
  if (!Number.isSafeInteger(config.seed) || config.seed < 0) {
    return new ConfigError({
      message: `seed must be a non-negative integer, got ${String(config.seed)}`,
      setting: 'seed',
    });
  }
  if (
    !Number.isInteger(config.cacheTtl) ||
    config.cacheTtl < CACHE_TTL_MIN ||
    config.cacheTtl > CACHE_TTL_MAX
  ) {
    return new ConfigError({
      message: `cacheTtl must be an integer between ${CACHE_TTL_MIN} and ${CACHE_TTL_MAX} seconds, got ${String(config.cacheTtl)}`,
      setting: 'cacheTtl',
    });
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 1) {
    return new ConfigError({
      message: `maxDepth must be a positive integer, got ${String(config.maxDepth)}`,
      setting: 'maxDepth',
    });
  }
  for (const flag of [
    'consistentResponses',
    'cacheEnabled',
    'preferExamples',
  ] as const) {
    if (typeof config[flag] !== 'boolean') {
      return new ConfigError({
        message: `${flag} must be a boolean`,
        setting: flag,
      });
    }
  }
  return undefined;
}
