/**
 * String Generator
 * Pattern first, then format, then free text within the length bounds
 */

import { ok } from '../../types/result.js';
import { GeneratorMessage } from '../../types/errors.js';
import type { StringSchema, TypedSchema } from '../../types/schema.js';
import type { FormatRegistry } from '../../registry/format-registry.js';
import { synthesizePattern } from '../../regex/pattern-synthesizer.js';
import { codePointLength } from '../../schema/json-value.js';
import type { Rng } from '../../util/rng.js';
import { createDefaultFormatRegistry } from '../formats/index.js';
import { wordLists } from '../formats/words.js';
import {
  DataGenerator,
  type GenerationContext,
  type GenerationResult,
} from '../data-generator.js';

const DEFAULT_MAX_LENGTH = 24;
const FORMAT_ATTEMPTS = 16;
const ALPHANUMERIC = Array.from(
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'
);

export class StringGenerator extends DataGenerator<StringSchema> {
  readonly kind = 'string';

  constructor(
    private readonly formats: FormatRegistry = createDefaultFormatRegistry()
  ) {
    super();
  }

  protected accepts(schema: TypedSchema): schema is StringSchema {
    return schema.type === 'string';
  }

  override supportsFormat(format: string): boolean {
    return this.formats.supports(format);
  }

  protected produce(
    schema: StringSchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const { minLength, maxLength } = schema;
    if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
      return this.fail(
        GeneratorMessage.INVALID_LENGTH,
        context,
        `minLength ${minLength} exceeds maxLength ${maxLength}`,
        'minLength'
      );
    }

    if (schema.pattern !== undefined) {
      return this.fromPattern(schema, schema.pattern, rng, context);
    }
    if (schema.format !== undefined) {
      return this.fromFormat(schema, schema.format, rng, context);
    }
    return ok(this.freeText(schema, rng));
  }

  private fromPattern(
    schema: StringSchema,
    pattern: string,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const result = synthesizePattern(pattern, rng.fork('pattern'), {
      minLength: schema.minLength,
      maxLength: schema.maxLength,
    });
    if (result.isOk()) return result;

    const failure = result.error;
    if (failure.reason === 'length') {
      return this.fail(GeneratorMessage.INVALID_LENGTH, context, failure.message, 'maxLength');
    }
    return this.fail(GeneratorMessage.INVALID_PATTERN, context, failure.message, 'pattern');
  }

  private fromFormat(
    schema: StringSchema,
    format: string,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const generator = this.formats.get(format);
    if (!generator) {
      return this.fail(GeneratorMessage.UNSUPPORTED_STRING_FORMAT, context, format, 'format');
    }
    for (let attempt = 0; attempt < FORMAT_ATTEMPTS; attempt++) {
      const value = generator.generate(rng.fork(`format:${attempt}`));
      if (fitsLength(value, schema)) return ok(value);
    }
    return this.fail(
      GeneratorMessage.INVALID_LENGTH,
      context,
      `no ${format} value between ${schema.minLength ?? 0} and ${schema.maxLength ?? 'any'} characters`,
      'format'
    );
  }

  /** Lorem words trimmed or padded to a length drawn from the bounds. */
  private freeText(schema: StringSchema, rng: Rng): string {
    const min = schema.minLength ?? Math.min(1, schema.maxLength ?? 1);
    const max = schema.maxLength ?? Math.max(min, DEFAULT_MAX_LENGTH);
    const target = rng.int(min, max);
    if (target === 0) return '';

    const words = wordLists().lorem;
    const textRng = rng.fork('text');
    let text = textRng.pick(words);
    while (text.length < target) {
      const word = textRng.pick(words);
      text = text.length + 1 + word.length <= target ? `${text} ${word}` : text + pad(textRng, target - text.length);
    }
    return text.slice(0, target);
  }
}

function pad(rng: Rng, count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) out += rng.pick(ALPHANUMERIC);
  return out;
}

function fitsLength(value: string, schema: StringSchema): boolean {
  const length = codePointLength(value);
  return (
    (schema.minLength === undefined || length >= schema.minLength) &&
    (schema.maxLength === undefined || length <= schema.maxLength)
  );
}
