/**
 * Boolean and null generators
 */

import { ok } from '../../types/result.js';
import type {
  BooleanSchema,
  NullSchema,
  TypedSchema,
} from '../../types/schema.js';
import type { Rng } from '../../util/rng.js';
import { DataGenerator, type GenerationResult } from '../data-generator.js';

export class BooleanGenerator extends DataGenerator<BooleanSchema> {
  readonly kind = 'boolean';

  protected accepts(schema: TypedSchema): schema is BooleanSchema {
    return schema.type === 'boolean';
  }

  protected produce(_schema: BooleanSchema, rng: Rng): GenerationResult {
    return ok(rng.bool());
  }
}

export class NullGenerator extends DataGenerator<NullSchema> {
  readonly kind = 'null';

  protected accepts(schema: TypedSchema): schema is NullSchema {
    return schema.type === 'null';
  }

  protected produce(): GenerationResult {
    return ok(null);
  }
}
