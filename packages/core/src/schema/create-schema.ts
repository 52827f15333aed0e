/* eslint-disable max-lines */
/**
 * Schema construction
 * Turns an untrusted JSON-like description into a validated, frozen Schema.
 * Every invariant violation is collected as a SchemaIssue; nothing is thrown
 * unless the caller asks for it through assertSchema.
 */

import { ValidationError, type SchemaIssue } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import {
  INTEGER_FORMATS,
  NUMBER_FORMATS,
  SCHEMA_TYPES,
  STRING_FORMATS,
  resolveSchema,
  type ArraySchema,
  type CustomSchema,
  type JsonValue,
  type NumericSchema,
  type NumberFormat,
  type ObjectSchema,
  type PropertyDependency,
  type Schema,
  type SchemaAnnotations,
  type SchemaType,
  type StringFormat,
  type StringSchema,
} from '../types/schema.js';
import { canonicalJSON } from '../util/canonical-json.js';
import { deepFreeze } from '../util/deep-freeze.js';
import { setOwn } from '../util/own-property.js';
import { instanceIssues } from './instance-check.js';
import { isJsonValue, isPlainRecord, jsonKind } from './json-value.js';

export type RefResolver = (ref: string) => Result<Schema, SchemaIssue[]>;

export interface CreateSchemaOptions {
  /** Resolves `$ref` strings; without it every reference is invalid */
  resolveRef?: RefResolver;
  /** Kinds registered on the coordinator, accepted as `type` values */
  customKinds?: readonly string[];
}

type RawSchema = Readonly<Record<string, unknown>>;

const UNSUPPORTED_COMPOSITION = [
  'anyOf',
  'oneOf',
  'not',
  'if',
  'then',
  'else',
] as const;

const MAX_PROPERTY_NAME_LENGTH = 255;

class SchemaBuilder {
  readonly issues: SchemaIssue[] = [];

  constructor(private readonly options: CreateSchemaOptions) {}

  issue(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  node(raw: unknown, path: string): Schema | undefined {
    if (!isPlainRecord(raw)) {
      this.issue(path, 'Schema must be an object');
      return undefined;
    }
    if ('$ref' in raw) return this.ref(raw, path);
    if ('allOf' in raw) return this.allOf(raw, path);

    for (const keyword of UNSUPPORTED_COMPOSITION) {
      if (keyword in raw) {
        this.issue(
          `${path}/${keyword}`,
          `Unsupported composition keyword: ${keyword}`
        );
      }
    }

    const typed = this.resolveType(raw, path);
    if (!typed) return undefined;
    const { type, nullable } = typed;

    const annotations = this.annotations(raw, path, nullable);
    let schema: Schema | undefined;
    switch (type) {
      case 'string':
        schema = this.string(raw, path, annotations);
        break;
      case 'number':
      case 'integer':
        schema = this.numeric(raw, path, type, annotations);
        break;
      case 'boolean':
        schema = { ...annotations, type: 'boolean' };
        break;
      case 'null':
        schema = { ...annotations, type: 'null' };
        break;
      case 'array':
        schema = this.array(raw, path, annotations);
        break;
      case 'object':
        schema = this.object(raw, path, annotations);
        break;
      default:
        schema = this.custom(raw, path, type, annotations);
    }
    if (schema) this.literals(schema, path);
    return schema;
  }

  private ref(raw: RawSchema, path: string): Schema | undefined {
    const ref = raw.$ref;
    if ('type' in raw) {
      this.issue(path, 'Invalid reference: $ref and type are mutually exclusive');
    }
    for (const key of Object.keys(raw)) {
      if (key !== '$ref' && key !== 'description' && key !== 'type') {
        this.issue(
          `${path}/${key}`,
          `Invalid reference: $ref cannot be combined with ${key}`
        );
      }
    }
    if (typeof ref !== 'string' || ref.length === 0) {
      this.issue(`${path}/$ref`, 'Invalid reference: $ref must be a non-empty string');
      return undefined;
    }
    const description = this.optionalString(raw, 'description', path);
    if (!this.options.resolveRef) {
      this.issue(`${path}/$ref`, `Invalid reference: ${ref}`);
      return undefined;
    }
    const resolved = this.options.resolveRef(ref);
    if (resolved.isErr()) {
      this.issues.push(...resolved.error);
      return undefined;
    }
    return description === undefined
      ? { $ref: ref, target: resolved.value }
      : { $ref: ref, target: resolved.value, description };
  }

  /**
   * Object allOf: members are merged into one object schema, properties and
   * required unioned, the tightest property counts kept.
   */
  private allOf(raw: RawSchema, path: string): Schema | undefined {
    const members = raw.allOf;
    if (!Array.isArray(members) || members.length === 0) {
      this.issue(`${path}/allOf`, 'allOf must be a non-empty array of schemas');
      return undefined;
    }
    const rest: Record<string, unknown> = { ...raw };
    delete rest.allOf;
    const hasOwnShape = Object.keys(rest).some(
      (key) => key !== 'description' && key !== 'title'
    );
    const parts: unknown[] = hasOwnShape
      ? [{ type: 'object', ...rest }, ...members]
      : members;

    let merged: ObjectSchema | undefined;
    for (const [index, part] of parts.entries()) {
      const memberIndex = hasOwnShape ? index - 1 : index;
      const memberPath = memberIndex < 0 ? path : `${path}/allOf/${memberIndex}`;
      const built = this.node(part, memberPath);
      if (!built) continue;
      const target = resolveSchema(built);
      if (target.type !== 'object') {
        this.issue(
          memberPath,
          `Unsupported composition keyword: allOf member of type ${target.type}`
        );
        continue;
      }
      merged = merged ? mergeObjects(merged, target) : target;
    }
    if (!merged) return undefined;
    const title = this.optionalString(raw, 'title', path);
    const description = this.optionalString(raw, 'description', path);
    return {
      ...merged,
      ...(title !== undefined ? { title } : {}),
      ...(description !== undefined ? { description } : {}),
    };
  }

  private resolveType(
    raw: RawSchema,
    path: string
  ): { type: string; nullable: boolean } | undefined {
    let type: unknown = raw.type;
    let nullable = false;

    // OpenAPI 3.1 style ["string", "null"]
    if (Array.isArray(type)) {
      const named = type.filter((t: unknown) => t !== 'null');
      nullable = named.length < type.length;
      if (named.length === 1) {
        type = named[0];
      } else if (named.length === 0) {
        type = 'null';
      } else {
        this.issue(
          `${path}/type`,
          `Invalid type specification: multiple types ${JSON.stringify(named)}`
        );
        return undefined;
      }
    }

    if (type === undefined) {
      const inferred = inferType(raw);
      if (!inferred) {
        this.issue(path, 'Missing type specification');
        return undefined;
      }
      type = inferred;
    }

    if (typeof type !== 'string') {
      this.issue(`${path}/type`, 'Invalid type specification');
      return undefined;
    }
    if (type === 'custom') {
      const kind = raw.kind;
      if (typeof kind !== 'string' || !this.isCustomKind(kind)) {
        this.issue(
          `${path}/kind`,
          `Invalid type specification: unknown custom kind ${String(kind)}`
        );
        return undefined;
      }
      return { type: kind, nullable };
    }
    if (!isSchemaType(type) && !this.isCustomKind(type)) {
      this.issue(`${path}/type`, `Invalid type specification: ${type}`);
      return undefined;
    }
    return { type, nullable };
  }

  private isCustomKind(kind: string): boolean {
    return this.options.customKinds?.includes(kind) ?? false;
  }

  private annotations(
    raw: RawSchema,
    path: string,
    nullableFromType: boolean
  ): SchemaAnnotations {
    const out: {
      -readonly [K in keyof SchemaAnnotations]: SchemaAnnotations[K];
    } = {};
    const title = this.optionalString(raw, 'title', path);
    if (title !== undefined) out.title = title;
    const description = this.optionalString(raw, 'description', path);
    if (description !== undefined) out.description = description;

    const nullable = raw.nullable;
    if (nullable !== undefined && typeof nullable !== 'boolean') {
      this.issue(`${path}/nullable`, 'nullable must be a boolean');
    } else if (nullable === true || nullableFromType) {
      out.nullable = true;
    }

    for (const key of ['default', 'example'] as const) {
      if (!(key in raw)) continue;
      const value = raw[key];
      if (isJsonValue(value)) out[key] = value;
      else this.issue(`${path}/${key}`, `${key} must be a JSON value`);
    }

    if ('examples' in raw) {
      const examples = raw.examples;
      if (Array.isArray(examples) && examples.every((e: unknown) => isJsonValue(e))) {
        out.examples = examples.filter(isJsonValue);
      } else {
        this.issue(`${path}/examples`, 'examples must be an array of JSON values');
      }
    }

    const values = 'const' in raw ? [raw.const] : raw.enum;
    if (values !== undefined) {
      if (!Array.isArray(values) || values.length === 0) {
        this.issue(`${path}/enum`, 'enum must be a non-empty array');
      } else if (!values.every((v: unknown) => isJsonValue(v))) {
        this.issue(`${path}/enum`, 'enum entries must be JSON values');
      } else {
        const entries = values.filter(isJsonValue);
        const seen = new Set<string>();
        entries.forEach((entry, index) => {
          const key = canonicalJSON(entry);
          if (seen.has(key)) {
            this.issue(
              `${path}/enum/${index}`,
              `Duplicate enum value: ${key}`
            );
          }
          seen.add(key);
        });
        out.enum = entries;
      }
    }
    return out;
  }

  /** default, example, examples and enum entries must satisfy the schema. */
  private literals(schema: Schema, path: string): void {
    const target = resolveSchema(schema);
    const check = (value: JsonValue, at: string, label: string): void => {
      for (const problem of instanceIssues(value, target)) {
        this.issue(at, `Invalid ${label} value: ${problem}`);
      }
    };
    if (target.default !== undefined) check(target.default, `${path}/default`, 'default');
    if (target.example !== undefined) check(target.example, `${path}/example`, 'example');
    target.examples?.forEach((value, index) =>
      check(value, `${path}/examples/${index}`, 'example')
    );
    // enum entries only need the right type; length rules do not apply to them
    target.enum?.forEach((value, index) => {
      if (value === null ? target.type === 'null' || target.nullable : typeMatches(value, target.type)) {
        return;
      }
      this.issue(
        `${path}/enum/${index}`,
        `Invalid enum value: expected ${target.type}, got ${jsonKind(value)}`
      );
    });
  }

  private string(
    raw: RawSchema,
    path: string,
    annotations: SchemaAnnotations
  ): StringSchema {
    const schema: { -readonly [K in keyof StringSchema]: StringSchema[K] } = {
      ...annotations,
      type: 'string',
    };
    const format = raw.format;
    if (format !== undefined) {
      if (isStringFormat(format)) schema.format = format;
      else
        this.issue(
          `${path}/format`,
          `Invalid format specification: ${String(format)} for type string`
        );
    }
    const pattern = raw.pattern;
    if (pattern !== undefined) {
      if (typeof pattern !== 'string' || !compiles(pattern)) {
        this.issue(
          `${path}/pattern`,
          `Invalid regular expression pattern: ${String(pattern)}`
        );
      } else {
        schema.pattern = pattern;
      }
    }
    schema.minLength = this.count(raw, 'minLength', path);
    schema.maxLength = this.count(raw, 'maxLength', path);
    this.ordered(schema.minLength, schema.maxLength, path, 'minLength', 'maxLength');
    return stripUndefined(schema);
  }

  private numeric(
    raw: RawSchema,
    path: string,
    type: 'number' | 'integer',
    annotations: SchemaAnnotations
  ): NumericSchema {
    const schema: { -readonly [K in keyof NumericSchema]: NumericSchema[K] } = {
      ...annotations,
      type,
    };
    const format = raw.format;
    if (format !== undefined) {
      const allowed: readonly string[] =
        type === 'integer' ? INTEGER_FORMATS : NUMBER_FORMATS;
      if (typeof format === 'string' && allowed.includes(format) && isNumberFormat(format)) {
        schema.format = format;
      } else {
        this.issue(
          `${path}/format`,
          `Invalid format specification: ${String(format)} for type ${type}`
        );
      }
    }

    schema.minimum = this.finite(raw, 'minimum', path);
    schema.maximum = this.finite(raw, 'maximum', path);
    schema.exclusiveMinimum = this.exclusive(raw, 'exclusiveMinimum', path, (bound) => {
      if (schema.minimum === undefined || bound >= schema.minimum) {
        schema.minimum = bound;
        return true;
      }
      return false;
    });
    schema.exclusiveMaximum = this.exclusive(raw, 'exclusiveMaximum', path, (bound) => {
      if (schema.maximum === undefined || bound <= schema.maximum) {
        schema.maximum = bound;
        return true;
      }
      return false;
    });

    const multipleOf = this.finite(raw, 'multipleOf', path);
    if (multipleOf !== undefined && multipleOf <= 0) {
      this.issue(`${path}/multipleOf`, `Invalid multipleOf value: ${multipleOf} must be greater than 0`);
    } else {
      schema.multipleOf = multipleOf;
    }

    const { minimum, maximum } = schema;
    if (minimum !== undefined && maximum !== undefined) {
      const strict = schema.exclusiveMinimum === true || schema.exclusiveMaximum === true;
      if (minimum > maximum || (minimum === maximum && strict)) {
        this.issue(
          path,
          `Invalid numeric bounds: minimum ${minimum} exceeds maximum ${maximum}`
        );
      }
    }
    return stripUndefined(schema);
  }

  private exclusive(
    raw: RawSchema,
    key: 'exclusiveMinimum' | 'exclusiveMaximum',
    path: string,
    fromNumber: (bound: number) => boolean
  ): boolean | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number' && Number.isFinite(value)) {
      return fromNumber(value);
    }
    this.issue(`${path}/${key}`, `${key} must be a boolean or a number`);
    return undefined;
  }

  private array(
    raw: RawSchema,
    path: string,
    annotations: SchemaAnnotations
  ): ArraySchema {
    const schema: { -readonly [K in keyof ArraySchema]: ArraySchema[K] } = {
      ...annotations,
      type: 'array',
    };
    const items = raw.items;
    if (Array.isArray(items)) {
      const tuple: Schema[] = [];
      items.forEach((item: unknown, index) => {
        const built = this.node(item, `${path}/items/${index}`);
        if (built) tuple.push(built);
      });
      schema.items = tuple;
    } else if (items !== undefined) {
      if (isPlainRecord(items)) schema.items = this.node(items, `${path}/items`);
      else this.issue(`${path}/items`, 'Invalid items specification: expected a schema or an array of schemas');
    }

    const additionalItems = raw.additionalItems;
    if (typeof additionalItems === 'boolean') {
      schema.additionalItems = additionalItems;
    } else if (additionalItems !== undefined) {
      schema.additionalItems = this.node(additionalItems, `${path}/additionalItems`);
    }
    if (raw.contains !== undefined) {
      schema.contains = this.node(raw.contains, `${path}/contains`);
    }

    const uniqueItems = raw.uniqueItems;
    if (typeof uniqueItems === 'boolean') {
      schema.uniqueItems = uniqueItems;
    } else if (uniqueItems !== undefined) {
      this.issue(`${path}/uniqueItems`, 'uniqueItems must be a boolean');
    }

    schema.minItems = this.count(raw, 'minItems', path);
    schema.maxItems = this.count(raw, 'maxItems', path);
    this.ordered(schema.minItems, schema.maxItems, path, 'minItems', 'maxItems');
    schema.minContains = this.count(raw, 'minContains', path);
    schema.maxContains = this.count(raw, 'maxContains', path);
    this.ordered(schema.minContains, schema.maxContains, path, 'minContains', 'maxContains');
    return stripUndefined(schema);
  }

  private object(
    raw: RawSchema,
    path: string,
    annotations: SchemaAnnotations
  ): ObjectSchema {
    const schema: { -readonly [K in keyof ObjectSchema]: ObjectSchema[K] } = {
      ...annotations,
      type: 'object',
    };

    const rawProperties = raw.properties;
    if (rawProperties !== undefined) {
      if (!isPlainRecord(rawProperties)) {
        this.issue(`${path}/properties`, 'Invalid properties specification: expected an object');
      } else {
        const properties: Record<string, Schema> = {};
        for (const [name, value] of Object.entries(rawProperties)) {
          const at = `${path}/properties/${escapePointer(name)}`;
          const nameProblem = propertyNameProblem(name);
          if (nameProblem) this.issue(at, `Invalid property name '${name}': ${nameProblem}`);
          const built = this.node(value, at);
          if (built) setOwn(properties, name, built);
        }
        schema.properties = properties;
      }
    }
    const known = new Set(
      isPlainRecord(rawProperties) ? Object.keys(rawProperties) : []
    );

    const required = raw.required;
    if (required !== undefined) {
      if (!Array.isArray(required) || !required.every((r: unknown) => typeof r === 'string')) {
        this.issue(`${path}/required`, 'required must be an array of property names');
      } else {
        const names = required.filter((r: unknown): r is string => typeof r === 'string');
        names.forEach((name, index) => {
          if (!known.has(name)) {
            this.issue(
              `${path}/required/${index}`,
              `Required property '${name}' is not defined in properties`
            );
          }
        });
        schema.required = Array.from(new Set(names));
      }
    }

    const additional = raw.additionalProperties;
    if (typeof additional === 'boolean') {
      schema.additionalProperties = additional;
    } else if (additional !== undefined) {
      schema.additionalProperties = this.node(additional, `${path}/additionalProperties`);
    }

    const patternProperties = raw.patternProperties;
    if (patternProperties !== undefined) {
      if (!isPlainRecord(patternProperties)) {
        this.issue(`${path}/patternProperties`, 'Invalid pattern property specification: expected an object');
      } else {
        const out: Record<string, Schema> = {};
        for (const [pattern, value] of Object.entries(patternProperties)) {
          const at = `${path}/patternProperties/${escapePointer(pattern)}`;
          if (!compiles(pattern)) {
            this.issue(at, `Invalid pattern property specification: ${pattern}`);
            continue;
          }
          const built = this.node(value, at);
          if (built) setOwn(out, pattern, built);
        }
        schema.patternProperties = out;
      }
    }

    const dependencies = this.dependencies(raw, path, known);
    if (dependencies) schema.dependencies = dependencies;

    schema.minProperties = this.count(raw, 'minProperties', path);
    schema.maxProperties = this.count(raw, 'maxProperties', path);
    this.ordered(schema.minProperties, schema.maxProperties, path, 'minProperties', 'maxProperties');
    return stripUndefined(schema);
  }

  private dependencies(
    raw: RawSchema,
    path: string,
    known: ReadonlySet<string>
  ): Record<string, PropertyDependency> | undefined {
    const sources = ['dependencies', 'dependentRequired', 'dependentSchemas'] as const;
    const out: Record<string, PropertyDependency> = {};
    let seen = false;
    for (const keyword of sources) {
      const value = raw[keyword];
      if (value === undefined) continue;
      seen = true;
      if (!isPlainRecord(value)) {
        this.issue(`${path}/${keyword}`, `Invalid property dependency: ${keyword} must be an object`);
        continue;
      }
      for (const [trigger, dependency] of Object.entries(value)) {
        const at = `${path}/${keyword}/${escapePointer(trigger)}`;
        if (!known.has(trigger)) {
          this.issue(at, `Invalid property dependency: '${trigger}' is not defined in properties`);
        }
        if (Array.isArray(dependency)) {
          const names = dependency.filter((d: unknown): d is string => typeof d === 'string');
          if (names.length !== dependency.length) {
            this.issue(at, 'Invalid property dependency: companion names must be strings');
            continue;
          }
          for (const name of names) {
            if (!known.has(name)) {
              this.issue(at, `Invalid property dependency: '${name}' is not defined in properties`);
            }
          }
          setOwn(out, trigger, names);
        } else if (isPlainRecord(dependency)) {
          const built = this.node(dependency, at);
          if (built) setOwn(out, trigger, built);
        } else {
          this.issue(at, 'Invalid property dependency: expected a list of property names or a schema');
        }
      }
    }
    return seen ? out : undefined;
  }

  private custom(
    raw: RawSchema,
    path: string,
    kind: string,
    annotations: SchemaAnnotations
  ): CustomSchema {
    const schema: { -readonly [K in keyof CustomSchema]: CustomSchema[K] } = {
      ...annotations,
      type: 'custom',
      kind,
    };
    schema.format = this.optionalString(raw, 'format', path);
    const options = raw.options;
    if (options !== undefined) {
      if (isPlainRecord(options) && Object.values(options).every((v: unknown) => isJsonValue(v))) {
        const copy: Record<string, JsonValue> = {};
        for (const [key, value] of Object.entries(options)) {
          if (isJsonValue(value)) setOwn(copy, key, value);
        }
        schema.options = copy;
      } else {
        this.issue(`${path}/options`, 'options must be an object of JSON values');
      }
    }
    return stripUndefined(schema);
  }

  private optionalString(raw: RawSchema, key: string, path: string): string | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.issue(`${path}/${key}`, `${key} must be a string`);
    return undefined;
  }

  private finite(raw: RawSchema, key: string, path: string): number | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.issue(`${path}/${key}`, `${key} must be a finite number`);
    return undefined;
  }

  private count(raw: RawSchema, key: string, path: string): number | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      return value;
    }
    this.issue(`${path}/${key}`, `${key} must be a non-negative integer`);
    return undefined;
  }

  private ordered(
    min: number | undefined,
    max: number | undefined,
    path: string,
    minKey: string,
    maxKey: string
  ): void {
    if (min !== undefined && max !== undefined && min > max) {
      const label =
        minKey === 'minLength'
          ? 'Invalid length constraints'
          : minKey === 'minItems'
            ? 'Invalid array length constraints'
            : `Invalid ${minKey}/${maxKey} constraints`;
      this.issue(path, `${label}: ${minKey} ${min} exceeds ${maxKey} ${max}`);
    }
  }
}

function mergeObjects(a: ObjectSchema, b: ObjectSchema): ObjectSchema {
  const required = Array.from(new Set([...(a.required ?? []), ...(b.required ?? [])]));
  const minProperties = maxDefined(a.minProperties, b.minProperties);
  const maxProperties = minDefined(a.maxProperties, b.maxProperties);
  const additionalProperties =
    a.additionalProperties === false || b.additionalProperties === false
      ? false
      : (b.additionalProperties ?? a.additionalProperties);
  return stripUndefined({
    ...a,
    ...b,
    type: 'object',
    properties: { ...a.properties, ...b.properties },
    patternProperties:
      a.patternProperties || b.patternProperties
        ? { ...a.patternProperties, ...b.patternProperties }
        : undefined,
    dependencies:
      a.dependencies || b.dependencies
        ? { ...a.dependencies, ...b.dependencies }
        : undefined,
    required: required.length > 0 ? required : undefined,
    additionalProperties,
    minProperties,
    maxProperties,
  });
}

function maxDefined(a?: number, b?: number): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

function minDefined(a?: number, b?: number): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

function inferType(raw: RawSchema): SchemaType | undefined {
  if (
    'properties' in raw ||
    'patternProperties' in raw ||
    'required' in raw ||
    'additionalProperties' in raw
  ) {
    return 'object';
  }
  if ('items' in raw) return 'array';
  const values = 'const' in raw ? [raw.const] : raw.enum;
  if (Array.isArray(values) && values.length > 0) {
    const kinds = new Set(
      values.map((v: unknown) => (isJsonValue(v) ? jsonKind(v) : 'invalid'))
    );
    if (kinds.size === 1) {
      const [kind] = kinds;
      if (kind !== undefined && isSchemaType(kind)) return kind;
    }
    if (kinds.size === 2 && kinds.has('integer') && kinds.has('number')) {
      return 'number';
    }
  }
  return undefined;
}

function typeMatches(value: JsonValue, type: string): boolean {
  const kind = jsonKind(value);
  if (type === 'custom') return true;
  if (type === 'number') return kind === 'number' || kind === 'integer';
  return kind === type;
}

function isSchemaType(value: string): value is SchemaType {
  return (SCHEMA_TYPES as readonly string[]).includes(value);
}

function isStringFormat(value: unknown): value is StringFormat {
  return typeof value === 'string' && (STRING_FORMATS as readonly string[]).includes(value);
}

function isNumberFormat(value: string): value is NumberFormat {
  return (
    (INTEGER_FORMATS as readonly string[]).includes(value) ||
    (NUMBER_FORMATS as readonly string[]).includes(value)
  );
}

export function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export function propertyNameProblem(name: string): string | undefined {
  if (name.length === 0) return 'must not be empty';
  if (name.includes('.') || name.includes('/')) return "must not contain '.' or '/'";
  if (name.length > MAX_PROPERTY_NAME_LENGTH) {
    return `must not exceed ${MAX_PROPERTY_NAME_LENGTH} characters`;
  }
  return undefined;
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

function stripUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}

/**
 * Build a validated, deep-frozen Schema or the ordered list of issues that
 * prevent it from existing.
 */
export function createSchema(
  input: unknown,
  options: CreateSchemaOptions = {}
): Result<Schema, SchemaIssue[]> {
  const builder = new SchemaBuilder(options);
  const schema = builder.node(input, '');
  if (builder.issues.length > 0 || !schema) {
    return err(
      builder.issues.length > 0
        ? builder.issues
        : [{ path: '', message: 'Invalid schema' }]
    );
  }
  return ok(deepFreeze(schema));
}

/** createSchema for callers that prefer exceptions. */
export function assertSchema(
  input: unknown,
  options: CreateSchemaOptions = {}
): Schema {
  const result = createSchema(input, options);
  if (result.isErr()) throw new ValidationError(result.error);
  return result.value;
}
