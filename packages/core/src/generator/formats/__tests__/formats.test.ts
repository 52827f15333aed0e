import { describe, it, expect } from 'vitest';
import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import { Rng } from '../../../util/rng.js';
import { builtInFormats, createDefaultFormatRegistry } from '../index.js';
import { STRING_FORMATS } from '../../../types/schema.js';
import { daysInMonth, isCalendarDate } from '../date-generator.js';

// ajv and ajv-formats are CommonJS; under NodeNext the class and plugin sit on `default`
const ajv = new AjvModule.default({ strict: true });
addFormatsModule.default(ajv);

const SEED = 424242;
const DRAWS = 200;

describe('built-in formats', () => {
  it('cover every string format of the schema model', () => {
    const registry = createDefaultFormatRegistry();
    for (const format of STRING_FORMATS) {
      expect(registry.supports(format)).toBe(true);
    }
  });

  for (const generator of builtInFormats()) {
    describe(generator.name, () => {
      it('produces values its own validator accepts', () => {
        const rng = new Rng(SEED, generator.name);
        for (let i = 0; i < DRAWS; i++) {
          const value = generator.generate(rng);
          expect(generator.validate(value), value).toBe(true);
        }
      });

      it('produces values ajv-formats accepts', () => {
        const validate = ajv.compile({ type: 'string', format: generator.name });
        const rng = new Rng(SEED, `oracle:${generator.name}`);
        for (let i = 0; i < DRAWS; i++) {
          const value = generator.generate(rng);
          expect(validate(value), value).toBe(true);
        }
      });

      it('accepts its own examples', () => {
        for (const example of generator.getExamples()) {
          expect(generator.validate(example), example).toBe(true);
        }
      });
    });
  }
});

describe('format validators', () => {
  it('reject malformed values', () => {
    const registry = createDefaultFormatRegistry();
    const reject = (format: string, value: string): boolean | undefined =>
      registry.get(format)?.validate(value);
    expect(reject('date', '2023-02-30')).toBe(false);
    expect(reject('date-time', '2023-01-01 10:00:00')).toBe(false);
    expect(reject('email', 'no-at-sign')).toBe(false);
    expect(reject('uuid', 'not-a-uuid')).toBe(false);
    expect(reject('ipv4', '256.1.1.1')).toBe(false);
    expect(reject('ipv6', '1:2:3')).toBe(false);
    expect(reject('hostname', 'localhost')).toBe(false);
    expect(reject('uri', 'not a uri')).toBe(false);
    expect(reject('byte', 'abc')).toBe(false);
    expect(reject('password', 'alllowercase1!')).toBe(false);
  });

  it('knows month lengths', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2023-13-01')).toBe(false);
  });
});
