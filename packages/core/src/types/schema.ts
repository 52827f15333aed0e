/**
 * Schema Model
 * Immutable tagged union describing the constraints on one generated value.
 * Instances are built and validated by createSchema (schema/create-schema.ts).
 */

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const STRING_FORMATS = [
  'date',
  'date-time',
  'password',
  'byte',
  'binary',
  'email',
  'uuid',
  'uri',
  'hostname',
  'ipv4',
  'ipv6',
] as const;
export type StringFormat = (typeof STRING_FORMATS)[number];

export const INTEGER_FORMATS = ['int32', 'int64'] as const;
export const NUMBER_FORMATS = ['float', 'double'] as const;
export type NumberFormat =
  | (typeof INTEGER_FORMATS)[number]
  | (typeof NUMBER_FORMATS)[number];

export const SCHEMA_TYPES = [
  'string',
  'number',
  'integer',
  'boolean',
  'array',
  'object',
  'null',
] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

/** Fields every variant may carry. */
export interface SchemaAnnotations {
  readonly title?: string;
  readonly description?: string;
  readonly default?: JsonValue;
  readonly example?: JsonValue;
  readonly examples?: readonly JsonValue[];
  readonly nullable?: boolean;
  readonly enum?: readonly JsonValue[];
}

export interface StringSchema extends SchemaAnnotations {
  readonly type: 'string';
  readonly format?: StringFormat;
  readonly pattern?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
}

export interface NumericSchema extends SchemaAnnotations {
  readonly type: 'number' | 'integer';
  readonly format?: NumberFormat;
  readonly minimum?: number;
  readonly maximum?: number;
  /** Narrows minimum to a strict bound */
  readonly exclusiveMinimum?: boolean;
  /** Narrows maximum to a strict bound */
  readonly exclusiveMaximum?: boolean;
  readonly multipleOf?: number;
}

export interface BooleanSchema extends SchemaAnnotations {
  readonly type: 'boolean';
}

export interface NullSchema extends SchemaAnnotations {
  readonly type: 'null';
}

export interface ArraySchema extends SchemaAnnotations {
  readonly type: 'array';
  /** One schema for every element, or one per position (tuple validation) */
  readonly items?: Schema | readonly Schema[];
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems?: boolean;
  /** Only meaningful when items is a tuple */
  readonly additionalItems?: boolean | Schema;
  readonly contains?: Schema;
  readonly minContains?: number;
  readonly maxContains?: number;
}

export type PropertyDependency = readonly string[] | Schema;

export interface ObjectSchema extends SchemaAnnotations {
  readonly type: 'object';
  readonly properties?: Readonly<Record<string, Schema>>;
  readonly required?: readonly string[];
  readonly additionalProperties?: boolean | Schema;
  readonly patternProperties?: Readonly<Record<string, Schema>>;
  readonly dependencies?: Readonly<Record<string, PropertyDependency>>;
  readonly minProperties?: number;
  readonly maxProperties?: number;
}

/**
 * A resolved reference. The target is substituted before dispatch; cycles
 * never reach this point because the parser rejects them.
 */
export interface RefSchema {
  readonly $ref: string;
  readonly target: Schema;
  readonly description?: string;
}

/** Schema for a kind registered at runtime on the coordinator. */
export interface CustomSchema extends SchemaAnnotations {
  readonly type: 'custom';
  readonly kind: string;
  readonly format?: string;
  readonly options?: Readonly<Record<string, JsonValue>>;
}

export type Schema =
  | StringSchema
  | NumericSchema
  | BooleanSchema
  | NullSchema
  | ArraySchema
  | ObjectSchema
  | RefSchema
  | CustomSchema;

export type TypedSchema = Exclude<Schema, RefSchema>;

export function isRefSchema(schema: Schema): schema is RefSchema {
  return '$ref' in schema;
}

/** Follow reference targets until a typed schema is reached. */
export function resolveSchema(schema: Schema): TypedSchema {
  let current = schema;
  while (isRefSchema(current)) {
    current = current.target;
  }
  return current;
}

/** Registry key: the custom kind for custom schemas, the type otherwise. */
export function schemaKind(schema: TypedSchema): string {
  return schema.type === 'custom' ? schema.kind : schema.type;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isTupleItems(
  items: Schema | readonly Schema[]
): items is readonly Schema[] {
  return Array.isArray(items);
}
