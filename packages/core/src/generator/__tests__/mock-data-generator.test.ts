import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import { MockDataGenerator } from '../mock-data-generator.js';
import type { GeneratorStrategy } from '../data-generator.js';
import { createSchema } from '../../schema/create-schema.js';
import { ErrorCode } from '../../errors/codes.js';
import { ok } from '../../types/result.js';
import { createLogger } from '../../util/logger.js';
import type { JsonValue, Schema } from '../../types/schema.js';
import { GenerationCache } from '../../util/cache.js';

// ajv and ajv-formats are CommonJS; under NodeNext the class and plugin sit on `default`
const ajv = new AjvModule.default({ strict: true });
addFormatsModule.default(ajv);

const FC_SEED = 424242;

const wideInteger: Schema = { type: 'integer', minimum: 0, maximum: 1_000_000_000 };

function fakeClock(start = 0) {
  let now = start;
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const money: GeneratorStrategy = {
  kind: 'money',
  supportsFormat: () => false,
  generate: () => ok('12.50 USD'),
};

describe('MockDataGenerator', () => {
  it('fails without a schema', () => {
    const generator = new MockDataGenerator();
    const result = generator.generateData(null);
    expect(result.isErr() && result.error.message).toBe('Missing schema specification');
    expect(result.isErr() && result.error.errorCode).toBe(ErrorCode.INVALID_SCHEMA_STRUCTURE);
    expect(generator.stats().failures).toBe(1);
  });

  it('rejects invalid configuration', () => {
    const created = MockDataGenerator.create({ config: { cacheTtl: 5 } });
    expect(created.isErr() && created.error.message).toBe(
      'cacheTtl must be an integer between 30 and 86400 seconds, got 5'
    );
    expect(() => new MockDataGenerator({ config: { maxDepth: 0 } })).toThrow(
      'maxDepth must be a positive integer, got 0'
    );
  });

  it('returns the same value for the same seed and schema', () => {
    fc.assert(
      fc.property(fc.nat(), (seed) => {
        const first = new MockDataGenerator({ config: { seed } }).generateData(wideInteger).unwrap();
        const second = new MockDataGenerator({ config: { seed, cacheEnabled: false } }).generateData(wideInteger).unwrap();
        return first === second;
      }),
      { seed: FC_SEED, numRuns: 50 }
    );
  });

  it('derives different values from different seeds', () => {
    const a = new MockDataGenerator({ config: { seed: 1 } }).generateData(wideInteger).unwrap();
    const b = new MockDataGenerator({ config: { seed: 2 } }).generateData(wideInteger).unwrap();
    expect(a).not.toBe(b);
  });

  it('spreads neighbouring seeds across a small range', () => {
    const schema: Schema = { type: 'integer', minimum: 0, maximum: 1000 };
    const values = new Set(
      Array.from({ length: 32 }, (_, i) => new MockDataGenerator({ config: { seed: i + 1 } }).generateData(schema).unwrap())
    );
    expect(values.size).toBeGreaterThan(20);
  });

  it('reaches more than one enum value across seeds', () => {
    const schema: Schema = { type: 'string', enum: ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] };
    const values = new Set(
      Array.from({ length: 32 }, (_, i) => new MockDataGenerator({ config: { seed: i + 1 } }).generateData(schema).unwrap())
    );
    expect(values.size).toBeGreaterThan(1);
  });

  it('distinguishes seeds that differ only above 32 bits', () => {
    const low = new MockDataGenerator({ config: { seed: 7 } }).generateData(wideInteger).unwrap();
    const high = new MockDataGenerator({ config: { seed: 2 ** 32 + 7 } }).generateData(wideInteger).unwrap();
    expect(high).not.toBe(low);
  });

  it('keeps generated decimals to the places of multipleOf', () => {
    const schema: Schema = { type: 'number', minimum: 0, maximum: 10, multipleOf: 0.001 };
    for (let seed = 0; seed < 50; seed++) {
      const value = new MockDataGenerator({ config: { seed } }).generateData(schema).unwrap();
      expect(typeof value).toBe('number');
      expect((String(value).split('.')[1] ?? '').length).toBeLessThanOrEqual(3);
    }
  });

  it('stores each generated value under its schema fingerprint', () => {
    const cache = new GenerationCache<JsonValue>({ ttl: 60 });
    const generator = new MockDataGenerator({ cache });
    const schema: Schema = {
      type: 'object',
      properties: { id: { type: 'integer', minimum: 1, maximum: 99 } },
      required: ['id'],
    };
    const value = generator.generateData(schema).unwrap();
    expect(cache.getCachedValue(generator.fingerprint(schema))).toBe(value);
    expect(cache.size).toBe(1);
  });

  it('fingerprints schemas by content, not key order', () => {
    const generator = new MockDataGenerator();
    const a: Schema = { type: 'integer', minimum: 1, maximum: 9 };
    const b: Schema = { maximum: 9, minimum: 1, type: 'integer' };
    expect(generator.fingerprint(a)).toBe(generator.fingerprint(b));
    expect(generator.fingerprint(a)).not.toBe(generator.fingerprint({ type: 'integer', minimum: 1, maximum: 8 }));
    expect(generator.fingerprint(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('serves repeated requests from the cache until the TTL passes', () => {
    const time = fakeClock();
    const generator = new MockDataGenerator({ config: { cacheTtl: 30 }, clock: time.clock });
    const first = generator.generateData(wideInteger).unwrap();
    expect(generator.generateData(wideInteger).unwrap()).toBe(first);
    expect(generator.stats()).toEqual({ generated: 1, cacheHits: 1, cacheMisses: 1, failures: 0 });

    time.advance(30_000);
    expect(generator.generateData(wideInteger).unwrap()).toBe(first);
    expect(generator.stats()).toEqual({ generated: 2, cacheHits: 1, cacheMisses: 2, failures: 0 });
  });

  it('bypasses the cache when it is disabled', () => {
    const generator = new MockDataGenerator({ config: { cacheEnabled: false } });
    const first = generator.generateData(wideInteger).unwrap();
    expect(generator.generateData(wideInteger).unwrap()).toBe(first);
    expect(generator.stats()).toEqual({ generated: 2, cacheHits: 0, cacheMisses: 0, failures: 0 });
  });

  it('varies values between calls without consistentResponses', () => {
    const generator = new MockDataGenerator({ config: { consistentResponses: false } });
    const first = generator.generateData(wideInteger).unwrap();
    const second = generator.generateData(wideInteger).unwrap();
    expect(second).not.toBe(first);
    expect(generator.stats().cacheHits).toBe(0);
  });

  it('clears the cache when a strategy is registered', () => {
    const generator = new MockDataGenerator();
    generator.generateData(wideInteger).unwrap();
    generator.registerStrategy(money);
    generator.generateData(wideInteger).unwrap();
    expect(generator.stats().cacheMisses).toBe(2);
    expect(generator.hasStrategy('money')).toBe(true);
    expect(generator.generateData({ type: 'custom', kind: 'money' }).unwrap()).toBe('12.50 USD');
  });

  it('lets configured strategies replace built-in kinds', () => {
    const generator = new MockDataGenerator({
      strategies: [{ kind: 'boolean', supportsFormat: () => false, generate: () => ok(true) }],
      config: { consistentResponses: false },
    });
    for (let i = 0; i < 10; i++) {
      expect(generator.generateData({ type: 'boolean' }).unwrap()).toBe(true);
    }
  });

  it('freezes generated values', () => {
    const value = new MockDataGenerator()
      .generateData({ type: 'object', properties: { id: { type: 'integer' } }, required: ['id'] })
      .unwrap();
    expect(Object.isFrozen(value)).toBe(true);
  });

  it('generates reproducible batches', () => {
    const schema: Schema = { type: 'string', pattern: '^[A-Z]{3}\\d{3}$' };
    const batch = new MockDataGenerator().generateMany(schema, 3).unwrap();
    expect(batch).toHaveLength(3);
    for (const value of batch) expect(value).toMatch(/^[A-Z]{3}\d{3}$/);
    expect(new MockDataGenerator().generateMany(schema, 3).unwrap()).toEqual(batch);
    expect(new MockDataGenerator().generateMany(undefined, 3).isErr()).toBe(true);
  });

  it('logs failures at warn level', () => {
    const lines: string[] = [];
    const generator = new MockDataGenerator({
      logger: createLogger({ level: 'warn', write: (line) => lines.push(line) }),
    });
    const result = generator.generateData({
      type: 'array',
      items: { type: 'integer', enum: [1, 2] },
      minItems: 5,
      uniqueItems: true,
    });
    expect(result.isErr() && result.error.errorCode).toBe(ErrorCode.CONSTRAINT_VIOLATION);
    expect(lines).toEqual([
      '[schemock] warn: Cannot generate unique items with given constraints: 5 unique items requested from a domain of 2 {"code":"E100","path":""}\n',
    ]);
  });

  it('produces values a JSON Schema validator accepts', () => {
    const document = {
      type: 'object',
      properties: {
        id: { type: 'string', format: 'uuid' },
        email: { type: 'string', format: 'email' },
        code: { type: 'string', pattern: '^[A-Z]{3}\\d{3}$' },
        score: { type: 'integer', minimum: 0, maximum: 100, multipleOf: 5 },
        ratio: { type: 'number', minimum: 0, maximum: 1 },
        tags: {
          type: 'array',
          items: { type: 'string', enum: ['a', 'b', 'c'] },
          minItems: 1,
          maxItems: 3,
          uniqueItems: true,
        },
        created: { type: 'string', format: 'date-time' },
      },
      required: ['id', 'email', 'code', 'score'],
      additionalProperties: false,
    };
    const schema = createSchema(document).unwrap();
    const validate = ajv.compile(document);
    fc.assert(
      fc.property(fc.nat(), (seed) => {
        const value = new MockDataGenerator({ config: { seed } }).generateData(schema).unwrap();
        return validate(value) === true;
      }),
      { seed: FC_SEED, numRuns: 100 }
    );
  });
});
