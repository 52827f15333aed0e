/**
 * MockDataGenerator
 * Coordinates schema fingerprinting, caching and strategy dispatch.
 */

import { err, ok, type Result } from '../types/result.js';
import { GeneratorError, GeneratorMessage, type ConfigError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import {
  resolveMockConfig,
  type MockConfig,
} from '../types/options.js';
import type { JsonValue, Schema } from '../types/schema.js';
import type { FormatRegistry } from '../registry/format-registry.js';
import {
  StrategyRegistry,
  createDefaultStrategies,
} from '../registry/strategy-registry.js';
import { GenerationCache, type Clock } from '../util/cache.js';
import { deepFreeze } from '../util/deep-freeze.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { Rng } from '../util/rng.js';
import { structuralHash } from '../util/struct-hash.js';
import type { GeneratorStrategy } from './data-generator.js';
import { createGenerationContext, dispatch } from './dispatch.js';
import type { NumberRanges } from './types/number-generator.js';

export interface MockDataGeneratorOptions {
  config?: Partial<MockConfig>;
  /** Shared cache; one is created from config.cacheTtl when omitted */
  cache?: GenerationCache<JsonValue>;
  /** Registered over the built-in strategies, replacing kinds they share */
  strategies?: Iterable<GeneratorStrategy>;
  formats?: FormatRegistry;
  numberRanges?: NumberRanges;
  logger?: Logger;
  clock?: Clock;
}

export interface GeneratorStats {
  generated: number;
  cacheHits: number;
  cacheMisses: number;
  failures: number;
}

export class MockDataGenerator {
  readonly config: Readonly<MockConfig>;
  private readonly registry: StrategyRegistry;
  private readonly cache: GenerationCache<JsonValue>;
  private readonly logger: Logger;
  private calls = 0;
  private readonly counters: GeneratorStats = {
    generated: 0,
    cacheHits: 0,
    cacheMisses: 0,
    failures: 0,
  };

  /** @throws ConfigError when the configuration does not validate */
  constructor(options: MockDataGeneratorOptions = {}) {
    this.config = Object.freeze(resolveMockConfig(options.config).unwrap());
    this.logger = options.logger ?? silentLogger;
    this.registry = new StrategyRegistry(
      createDefaultStrategies(options.formats, options.numberRanges)
    );
    for (const strategy of options.strategies ?? []) {
      this.registry.register(strategy);
    }
    this.cache =
      options.cache ??
      new GenerationCache<JsonValue>({ ttl: this.config.cacheTtl, clock: options.clock });
  }

  static create(
    options: MockDataGeneratorOptions = {}
  ): Result<MockDataGenerator, ConfigError> {
    const config = resolveMockConfig(options.config);
    if (config.isErr()) return config;
    return ok(new MockDataGenerator({ ...options, config: config.value }));
  }

  /**
   * Add a kind, or replace an existing one. Cached values may have come from
   * the replaced strategy, so the cache is cleared.
   */
  registerStrategy(strategy: GeneratorStrategy): void {
    this.registry.register(strategy);
    this.cache.clear();
    this.logger.debug(`registered strategy ${strategy.kind}`);
  }

  hasStrategy(kind: string): boolean {
    return this.registry.has(kind);
  }

  /** Stable digest of every constraint field of a schema. */
  fingerprint(schema: Schema): string {
    return structuralHash(schema).digest;
  }

  generateData(
    schema: Schema | null | undefined
  ): Result<JsonValue, GeneratorError> {
    if (schema === null || schema === undefined) {
      return this.failure(
        new GeneratorError({
          prefix: GeneratorMessage.MISSING_SCHEMA,
          path: '',
          errorCode: ErrorCode.INVALID_SCHEMA_STRUCTURE,
        })
      );
    }

    const fingerprint = this.fingerprint(schema);
    const cacheable = this.config.cacheEnabled && this.config.consistentResponses;
    if (cacheable) {
      const cached = this.cache.getCachedValue(fingerprint);
      if (cached !== undefined) {
        this.counters.cacheHits++;
        this.logger.debug('cache hit', { fingerprint: fingerprint.slice(0, 12) });
        return ok(cached);
      }
      this.counters.cacheMisses++;
      this.logger.debug('cache miss', { fingerprint: fingerprint.slice(0, 12) });
    }

    const label = this.config.consistentResponses
      ? fingerprint
      : `${fingerprint}#${this.calls++}`;
    const result = this.run(schema, label);
    if (result.isOk() && cacheable) {
      this.cache.set(fingerprint, result.value);
    }
    return result;
  }

  /**
   * Several values for one schema. Each index has its own stream, so the
   * batch is reproducible under consistentResponses; the cache is not used.
   */
  generateMany(
    schema: Schema | null | undefined,
    count: number
  ): Result<JsonValue[], GeneratorError> {
    if (schema === null || schema === undefined) {
      const missing = this.generateData(schema);
      return missing.isErr() ? missing : ok([missing.value]);
    }
    const fingerprint = this.fingerprint(schema);
    const values: JsonValue[] = [];
    for (let index = 0; index < count; index++) {
      const label = this.config.consistentResponses
        ? `${fingerprint}@${index}`
        : `${fingerprint}#${this.calls++}`;
      const result = this.run(schema, label);
      if (result.isErr()) return result;
      values.push(result.value);
    }
    return ok(values);
  }

  clearCache(): void {
    this.cache.clear();
  }

  stats(): GeneratorStats {
    return { ...this.counters };
  }

  private run(schema: Schema, label: string): Result<JsonValue, GeneratorError> {
    const context = createGenerationContext(this.registry, {
      maxDepth: this.config.maxDepth,
      preferExamples: this.config.preferExamples,
      logger: this.logger,
    });
    const result = dispatch(schema, new Rng(this.config.seed, label), context, this.registry);
    if (result.isErr()) return this.failure(result.error);
    this.counters.generated++;
    return ok(deepFreeze(result.value));
  }

  private failure(error: GeneratorError): Result<never, GeneratorError> {
    this.counters.failures++;
    this.logger.warn(error.message, { code: error.errorCode, path: error.path });
    return err(error);
  }
}
