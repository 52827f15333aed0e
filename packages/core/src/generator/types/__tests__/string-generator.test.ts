import { describe, it, expect } from 'vitest';
import { StringGenerator } from '../string-generator.js';
import { createGenerationContext } from '../../dispatch.js';
import { createDefaultFormatRegistry } from '../../formats/index.js';
import { FormatRegistry } from '../../../registry/format-registry.js';
import { ErrorCode } from '../../../errors/codes.js';
import { Rng } from '../../../util/rng.js';
import type { StringSchema, TypedSchema } from '../../../types/schema.js';

const SEEDS = Array.from({ length: 100 }, (_, i) => i + 1);

function draw(schema: TypedSchema, seed = 424242, preferExamples = false) {
  const generator = new StringGenerator();
  return generator.generate(schema, new Rng(seed, 'string'), createGenerationContext(undefined, { preferExamples }));
}

describe('StringGenerator', () => {
  it('keeps free text within the length bounds', () => {
    const schema: StringSchema = { type: 'string', minLength: 3, maxLength: 8 };
    for (const seed of SEEDS) {
      const value = draw(schema, seed).unwrap();
      expect(typeof value).toBe('string');
      const length = String(value).length;
      expect(length).toBeGreaterThanOrEqual(3);
      expect(length).toBeLessThanOrEqual(8);
    }
  });

  it('defaults free text to between 1 and 24 characters', () => {
    for (const seed of SEEDS) {
      const length = String(draw({ type: 'string' }, seed).unwrap()).length;
      expect(length).toBeGreaterThanOrEqual(1);
      expect(length).toBeLessThanOrEqual(24);
    }
  });

  it('returns the empty string when maxLength is 0', () => {
    expect(draw({ type: 'string', maxLength: 0 }).unwrap()).toBe('');
  });

  it('is a pure function of seed and label', () => {
    const schema: StringSchema = { type: 'string', minLength: 10, maxLength: 20 };
    expect(draw(schema, 99).unwrap()).toBe(draw(schema, 99).unwrap());
  });

  it('matches a pattern before considering the format', () => {
    const schema: StringSchema = { type: 'string', pattern: '^[A-Z]{3}\\d{3}$', format: 'email' };
    for (const seed of SEEDS) {
      expect(draw(schema, seed).unwrap()).toMatch(/^[A-Z]{3}\d{3}$/);
    }
  });

  it('reports a pattern that cannot fit the length bounds', () => {
    const result = draw({ type: 'string', pattern: '^[a-z]{5}$', maxLength: 3 });
    expect(result.isErr() && result.error.message).toBe(
      'Invalid length constraints: no match for ^[a-z]{5}$ between 0 and 3 characters'
    );
    expect(result.isErr() && result.error.constraint).toBe('maxLength');
  });

  it('produces values of the requested format', () => {
    const email = createDefaultFormatRegistry().get('email');
    expect(email).toBeDefined();
    for (const seed of SEEDS.slice(0, 20)) {
      const value = String(draw({ type: 'string', format: 'email' }, seed).unwrap());
      expect(email?.validate(value), value).toBe(true);
    }
  });

  it('fails when no format value fits the length bounds', () => {
    const result = draw({ type: 'string', format: 'uuid', maxLength: 10 });
    expect(result.isErr() && result.error.message).toBe(
      'Invalid length constraints: no uuid value between 0 and 10 characters'
    );
  });

  it('fails on a format missing from its registry', () => {
    const generator = new StringGenerator(new FormatRegistry());
    const result = generator.generate(
      { type: 'string', format: 'uuid' },
      new Rng(1, 'string'),
      createGenerationContext()
    );
    expect(result.isErr() && result.error.message).toBe('Unsupported string format: uuid');
    expect(generator.supportsFormat('uuid')).toBe(false);
  });

  it('rejects inverted length bounds', () => {
    const result = draw({ type: 'string', minLength: 5, maxLength: 2 });
    expect(result.isErr() && result.error.message).toBe(
      'Invalid length constraints: minLength 5 exceeds maxLength 2'
    );
    expect(result.isErr() && result.error.constraint).toBe('minLength');
  });

  it('draws from enum and prefers examples when asked', () => {
    for (const seed of SEEDS.slice(0, 20)) {
      expect(['red', 'green']).toContain(draw({ type: 'string', enum: ['red', 'green'] }, seed).unwrap());
    }
    expect(draw({ type: 'string', example: 'sample' }, 1, true).unwrap()).toBe('sample');
    expect(['a', 'b']).toContain(draw({ type: 'string', examples: ['a', 'b'] }, 1, true).unwrap());
  });

  it('refuses schemas of another type', () => {
    const result = draw({ type: 'boolean' });
    expect(result.isErr() && result.error.message).toBe(
      'Unsupported data type: string generator cannot handle type boolean'
    );
    expect(result.isErr() && result.error.errorCode).toBe(ErrorCode.UNSUPPORTED_KIND);
  });
});
