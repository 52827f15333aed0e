/**
 * Object Generator
 * Required and optional properties, dependency closure, pattern properties
 * and additional properties within the property count bounds.
 */

import { err, ok, type Result } from '../../types/result.js';
import { GeneratorError, GeneratorMessage } from '../../types/errors.js';
import {
  isJsonObject,
  resolveSchema,
  type JsonObject,
  type ObjectSchema,
  type Schema,
  type TypedSchema,
} from '../../types/schema.js';
import { compiles } from '../../schema/create-schema.js';
import { synthesizePattern } from '../../regex/pattern-synthesizer.js';
import type { Rng } from '../../util/rng.js';
import { setOwn } from '../../util/own-property.js';
import {
  DataGenerator,
  type GenerationContext,
  type GenerationResult,
} from '../data-generator.js';

export const OPTIONAL_PROPERTY_PROBABILITY = 0.5;
const PATTERN_KEY_ATTEMPTS = 8;
const PATTERN_KEY_MAX_LENGTH = 32;

interface Plan {
  /** Property schemas in output order, dependency schemas merged in */
  properties: Map<string, Schema>;
  required: Set<string>;
  /** Array dependencies: trigger -> companions */
  companions: Map<string, readonly string[]>;
  /** Schema dependencies: trigger -> object schema merged while present */
  merges: Map<string, ObjectSchema>;
}

export class ObjectGenerator extends DataGenerator<ObjectSchema> {
  readonly kind = 'object';

  protected accepts(schema: TypedSchema): schema is ObjectSchema {
    return schema.type === 'object';
  }

  protected produce(
    schema: ObjectSchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    const planned = this.plan(schema, context);
    if (planned.isErr()) return planned;
    const plan = planned.value;

    const min = schema.minProperties ?? 0;
    const max = schema.maxProperties ?? Number.POSITIVE_INFINITY;
    if (min > max) {
      return this.fail(GeneratorMessage.PROPERTY_COUNT, context, `minProperties ${min} exceeds maxProperties ${max}`, 'minProperties');
    }

    const chosen = closure(plan, plan.required);
    if (chosen.size > max) {
      return this.fail(
        GeneratorMessage.PROPERTY_COUNT,
        context,
        `${chosen.size} required properties exceed maxProperties ${max}`,
        'maxProperties'
      );
    }
    for (const name of chosen) {
      if (!plan.properties.has(name) && !mergedProperty(plan, chosen, name)) {
        return this.fail(GeneratorMessage.REQUIRED_FIELD, context, `${name} has no schema`, 'required');
      }
    }

    // optional properties: coin flip each, then top up in declared order
    const optional = [...plan.properties.keys()].filter((name) => !chosen.has(name));
    const coin = rng.fork('optional');
    for (const name of optional) {
      if (coin.bool(OPTIONAL_PROPERTY_PROBABILITY)) admit(plan, chosen, name, max);
    }
    for (const name of optional) {
      if (chosen.size >= min) break;
      admit(plan, chosen, name, max);
    }

    const values: JsonObject = {};
    for (const [name, property] of activeProperties(plan, chosen)) {
      const result = context.generate(property, rng.fork(`property:${name}`), name);
      if (result.isErr()) {
        return plan.required.has(name) ? this.requiredFailure(name, result.error, context) : result;
      }
      setOwn(values, name, result.value);
    }

    const patterns = this.patternEntries(schema, context);
    if (patterns.isErr()) return patterns;
    const extras = this.extras(schema, patterns.value, values, min, max, rng, context);
    if (extras.isErr()) return extras;

    if (Object.keys(values).length < min) {
      return this.fail(
        GeneratorMessage.PROPERTY_COUNT,
        context,
        `only ${Object.keys(values).length} of minProperties ${min} can be generated`,
        'minProperties'
      );
    }
    return ok(values);
  }

  /** Validate the property maps and flatten dependencies into a plan. */
  private plan(schema: ObjectSchema, context: GenerationContext): Result<Plan, GeneratorError> {
    const properties = new Map<string, Schema>();
    const declared: unknown = schema.properties ?? {};
    if (!isJsonObject(declared)) {
      return this.fail(GeneratorMessage.INVALID_PROPERTIES, context, 'properties must be a mapping', 'properties');
    }
    for (const [name, property] of Object.entries(schema.properties ?? {})) {
      if (!isSchemaObject(property)) {
        return this.fail(GeneratorMessage.INVALID_PROPERTIES, context, `${name} has no valid schema`, 'properties');
      }
      properties.set(name, property);
    }

    const companions = new Map<string, readonly string[]>();
    const merges = new Map<string, ObjectSchema>();
    for (const [trigger, dependency] of Object.entries(schema.dependencies ?? {})) {
      if (isNameList(dependency)) {
        companions.set(trigger, dependency);
        continue;
      }
      if (!isSchemaObject(dependency)) {
        return this.fail(
          GeneratorMessage.INVALID_DEPENDENCY,
          context,
          `${trigger} must name companion properties or give a schema`,
          'dependencies'
        );
      }
      const target = resolveSchema(dependency);
      if (target.type !== 'object') continue;
      merges.set(trigger, target);
    }

    return ok({ properties, required: new Set(schema.required ?? []), companions, merges });
  }

  private requiredFailure(
    name: string,
    cause: GeneratorError,
    context: GenerationContext
  ): Result<never, GeneratorError> {
    return err(
      new GeneratorError({
        prefix: GeneratorMessage.REQUIRED_FIELD,
        detail: `${name}: ${cause.message}`,
        path: context.path,
        constraint: 'required',
        errorCode: cause.errorCode,
        cause,
      })
    );
  }

  private patternEntries(
    schema: ObjectSchema,
    context: GenerationContext
  ): Result<Array<[string, Schema]>, GeneratorError> {
    const entries: Array<[string, Schema]> = [];
    for (const [pattern, property] of Object.entries(schema.patternProperties ?? {})) {
      if (!compiles(pattern) || !isSchemaObject(property)) {
        return this.fail(GeneratorMessage.INVALID_PATTERN_PROPERTY, context, pattern, 'patternProperties');
      }
      entries.push([pattern, property]);
    }
    return ok(entries);
  }

  /**
   * Pattern keys first (one per pattern while the budget allows, then round
   * robin up to minProperties), then additionalProperties as extra_<n>.
   */
  private extras(
    schema: ObjectSchema,
    patterns: ReadonlyArray<[string, Schema]>,
    values: JsonObject,
    min: number,
    max: number,
    rng: Rng,
    context: GenerationContext
  ): Result<JsonObject, GeneratorError> {
    const count = (): number => Object.keys(values).length;

    let round = 0;
    while (patterns.length > 0 && count() < max && (round === 0 || count() < min)) {
      let added = false;
      for (const [index, [pattern, property]] of patterns.entries()) {
        if (count() >= max || (round > 0 && count() >= min)) break;
        const key = this.patternKey(pattern, values, schema, rng.fork(`pattern:${index}:${round}`));
        if (key === undefined) continue;
        const result = context.generate(property, rng.fork(`pattern-value:${key}`), key);
        if (result.isErr()) return result;
        setOwn(values, key, result.value);
        added = true;
      }
      if (!added) break;
      round++;
    }

    const additional = schema.additionalProperties;
    if (isSchemaObject(additional)) {
      for (let n = 1; count() < min && count() < max; n++) {
        const key = `extra_${n}`;
        if (Object.hasOwn(values, key)) continue;
        const result = context.generate(additional, rng.fork(`additional:${n}`), key);
        if (result.isErr()) return result;
        setOwn(values, key, result.value);
      }
    }
    return ok(values);
  }

  private patternKey(
    pattern: string,
    values: JsonObject,
    schema: ObjectSchema,
    rng: Rng
  ): string | undefined {
    for (let attempt = 0; attempt < PATTERN_KEY_ATTEMPTS; attempt++) {
      const result = synthesizePattern(pattern, rng.fork(String(attempt)), {
        minLength: 1,
        maxLength: PATTERN_KEY_MAX_LENGTH,
      });
      if (result.isErr()) return undefined;
      const key = result.value;
      if (!Object.hasOwn(values, key) && !Object.hasOwn(schema.properties ?? {}, key)) return key;
    }
    return undefined;
  }
}

/** Add a property with its dependency closure if the whole set fits. */
function admit(plan: Plan, chosen: Set<string>, name: string, max: number): void {
  const next = closure(plan, new Set([...chosen, name]));
  for (const member of next) {
    if (!plan.properties.has(member) && !mergedProperty(plan, next, member)) return;
  }
  if (next.size > max) return;
  for (const member of next) chosen.add(member);
}

/** Close a property set over array and schema dependencies. */
function closure(plan: Plan, start: ReadonlySet<string>): Set<string> {
  const out = new Set(start);
  let changed = true;
  while (changed) {
    changed = false;
    for (const name of [...out]) {
      const needed = [
        ...(plan.companions.get(name) ?? []),
        ...(plan.merges.get(name)?.required ?? []),
      ];
      for (const companion of needed) {
        if (!out.has(companion)) {
          out.add(companion);
          changed = true;
        }
      }
    }
  }
  return out;
}

function mergedProperty(plan: Plan, chosen: ReadonlySet<string>, name: string): Schema | undefined {
  for (const [trigger, merge] of plan.merges) {
    if (chosen.has(trigger) && merge.properties && Object.hasOwn(merge.properties, name)) {
      return merge.properties[name];
    }
  }
  return undefined;
}

/** Chosen properties with their schemas, declared ones first. */
function activeProperties(plan: Plan, chosen: ReadonlySet<string>): Array<[string, Schema]> {
  const out: Array<[string, Schema]> = [];
  for (const [name, property] of plan.properties) {
    if (chosen.has(name)) out.push([name, mergedProperty(plan, chosen, name) ?? property]);
  }
  for (const name of chosen) {
    if (plan.properties.has(name)) continue;
    const merged = mergedProperty(plan, chosen, name);
    if (merged) out.push([name, merged]);
  }
  return out;
}

function isNameList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((name) => typeof name === 'string');
}

function isSchemaObject(value: unknown): value is Schema {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
