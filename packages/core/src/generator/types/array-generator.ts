/**
 * Array Generator
 * Homogeneous and tuple items, uniqueItems with infeasibility detection,
 * and contains placement.
 */

import { ok } from '../../types/result.js';
import { GeneratorMessage } from '../../types/errors.js';
import {
  isTupleItems,
  resolveSchema,
  type ArraySchema,
  type JsonValue,
  type Schema,
  type TypedSchema,
} from '../../types/schema.js';
import { matchesSchema } from '../../schema/instance-check.js';
import { canonicalJSON } from '../../util/canonical-json.js';
import { ceilDiv, floorDiv, ratFromNumber, type Rat } from '../../util/rational.js';
import type { Rng } from '../../util/rng.js';
import {
  DataGenerator,
  type GenerationContext,
  type GenerationResult,
} from '../data-generator.js';

const DEFAULT_MAX_ITEMS = 10;
/** Hard cap on regeneration attempts per unique item */
export const MAX_UNIQUE_ATTEMPTS = 100;

/** Matches of the contains schema still allowed outside the seeded slots */
interface ContainsCap {
  schema: Schema;
  remaining: number;
}

interface LengthPlan {
  lo: number;
  hi: number;
}

export class ArrayGenerator extends DataGenerator<ArraySchema> {
  readonly kind = 'array';

  protected accepts(schema: TypedSchema): schema is ArraySchema {
    return schema.type === 'array';
  }

  protected produce(
    schema: ArraySchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const { items } = schema;
    if (items === undefined || items === null || typeof items !== 'object') {
      return this.fail(GeneratorMessage.INVALID_ITEMS, context, 'items must be a schema or a list of schemas', 'items');
    }
    if (schema.minItems !== undefined && schema.maxItems !== undefined && schema.minItems > schema.maxItems) {
      return this.fail(
        GeneratorMessage.INVALID_ARRAY_LENGTH,
        context,
        `minItems ${schema.minItems} exceeds maxItems ${schema.maxItems}`,
        'minItems'
      );
    }

    if (isTupleItems(items)) {
      if (!items.every(isSchemaObject)) {
        return this.fail(GeneratorMessage.INVALID_ITEMS, context, 'tuple entries must be schemas', 'items');
      }
      return this.tuple(schema, items, rng, context);
    }
    return this.homogeneous(schema, items, rng, context);
  }

  private tuple(
    schema: ArraySchema,
    items: readonly Schema[],
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const positional = items.length;
    const extra = isSchemaObject(schema.additionalItems) ? schema.additionalItems : undefined;
    const lo = Math.max(schema.minItems ?? 0, Math.min(positional, schema.maxItems ?? positional));
    const hi = extra
      ? Math.max(lo, schema.maxItems ?? lo)
      : Math.min(positional, schema.maxItems ?? positional);
    if (lo > hi) {
      return this.fail(
        GeneratorMessage.INVALID_ARRAY_LENGTH,
        context,
        `a tuple of ${positional} items cannot reach minItems ${lo}`,
        'minItems'
      );
    }
    const target = rng.fork('length').int(lo, hi);
    const schemas = Array.from({ length: target }, (_, i) => (i < positional ? items[i] : extra));
    return this.fill(schema, schemas, rng, context);
  }

  private homogeneous(
    schema: ArraySchema,
    items: Schema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const plan = planLength(schema);
    const contains = schema.contains;
    const needed = contains ? (schema.minContains ?? 1) : 0;
    const limit = contains ? schema.maxContains : undefined;
    if (limit !== undefined && needed > limit) {
      return this.fail(
        GeneratorMessage.INVALID_ARRAY_LENGTH,
        context,
        `minContains ${needed} exceeds maxContains ${limit}`,
        'maxContains'
      );
    }
    if (needed > plan.hi) {
      return this.fail(
        GeneratorMessage.INVALID_ARRAY_LENGTH,
        context,
        `minContains ${needed} exceeds maxItems ${plan.hi}`,
        'minContains'
      );
    }

    let target = rng.fork('length').int(Math.max(plan.lo, needed), plan.hi);
    if (schema.uniqueItems === true) {
      const domain = uniqueDomainSize(items);
      if (domain !== undefined && domain < Math.max(plan.lo, needed)) {
        return this.fail(
          GeneratorMessage.UNIQUE_ITEMS_INFEASIBLE,
          context,
          `${Math.max(plan.lo, needed)} unique items requested from a domain of ${domain}`,
          'uniqueItems'
        );
      }
      if (domain !== undefined) target = Math.min(target, Math.max(domain, needed));
    }

    const schemas: Schema[] = Array.from({ length: target }, () => items);
    if (contains && needed > 0) {
      const positions = rng.fork('contains').shuffle(schemas.map((_, i) => i)).slice(0, needed);
      for (const position of positions) schemas[position] = contains;
    }
    const cap = contains && limit !== undefined
      ? { schema: contains, remaining: limit - needed }
      : undefined;
    return this.fill(schema, schemas, rng, context, cap);
  }

  /**
   * Generate one value per slot, regenerating duplicates under uniqueItems
   * and extra contains matches once the maxContains cap is spent.
   */
  private fill(
    schema: ArraySchema,
    schemas: readonly (Schema | undefined)[],
    rng: Rng,
    context: GenerationContext,
    cap?: ContainsCap
  ): GenerationResult {
    const unique = schema.uniqueItems === true;
    const attempts = unique || cap ? MAX_UNIQUE_ATTEMPTS : 1;
    const seen = new Set<string>();
    const values: JsonValue[] = [];
    let remaining = cap?.remaining ?? 0;

    for (const [index, slot] of schemas.entries()) {
      if (!slot) {
        return this.fail(GeneratorMessage.INVALID_ITEMS, context, `no schema for item ${index}`, 'items');
      }
      let placed = false;
      let overCap = false;
      for (let attempt = 0; attempt < attempts && !placed; attempt++) {
        const result = context.generate(slot, rng.fork(`${index}:${attempt}`), index);
        if (result.isErr()) return result;
        const key = unique ? canonicalJSON(result.value) : '';
        if (unique && seen.has(key)) continue;
        const matches =
          cap !== undefined && slot !== cap.schema && matchesSchema(result.value, cap.schema);
        if (matches && remaining === 0) {
          overCap = true;
          continue;
        }
        if (matches) remaining -= 1;
        seen.add(key);
        values.push(result.value);
        placed = true;
      }
      if (!placed && overCap) {
        return this.fail(
          GeneratorMessage.INVALID_ARRAY_LENGTH,
          context,
          `item ${index} keeps matching contains past maxContains ${schema.maxContains ?? 0}`,
          'maxContains'
        );
      }
      if (!placed) {
        return this.fail(
          GeneratorMessage.UNIQUE_ITEMS_INFEASIBLE,
          context,
          `no new value for item ${index} after ${MAX_UNIQUE_ATTEMPTS} attempts`,
          'uniqueItems'
        );
      }
    }
    return ok(values);
  }
}

function planLength(schema: ArraySchema): LengthPlan {
  const lo = schema.minItems ?? Math.min(1, schema.maxItems ?? 1);
  const hi = schema.maxItems ?? Math.max(lo, DEFAULT_MAX_ITEMS);
  return { lo, hi };
}

function isSchemaObject(value: unknown): value is Schema {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Number of distinct values an item schema can produce, when it is small
 * enough to matter; undefined means effectively unbounded.
 */
export function uniqueDomainSize(schema: Schema): number | undefined {
  const target = resolveSchema(schema);
  if (target.enum) return target.enum.length;
  switch (target.type) {
    case 'boolean':
      return 2;
    case 'null':
      return 1;
    case 'string':
      return target.maxLength === 0 ? 1 : undefined;
    case 'integer':
    case 'number': {
      const { minimum, maximum } = target;
      if (minimum === undefined || maximum === undefined) return undefined;
      const integral =
        target.type === 'integer' || target.format === 'int32' || target.format === 'int64';
      if (!integral && target.multipleOf === undefined) {
        return minimum === maximum ? 1 : undefined;
      }
      const m: Rat = target.multipleOf === undefined ? { p: 1n, q: 1n } : ratFromNumber(target.multipleOf);
      const step: Rat = integral ? { p: m.p, q: 1n } : m;
      const lo = ratFromNumber(minimum);
      const hi = ratFromNumber(maximum);
      let first = ceilDiv(lo.p * step.q, lo.q * step.p);
      let last = floorDiv(hi.p * step.q, hi.q * step.p);
      if (target.exclusiveMinimum && first * step.p * lo.q === lo.p * step.q) first += 1n;
      if (target.exclusiveMaximum && last * step.p * hi.q === hi.p * step.q) last -= 1n;
      return last < first ? 0 : Number(last - first + 1n);
    }
    default:
      return undefined;
  }
}
