/**
 * Swagger 2.0 / OpenAPI 3.x document parser
 * Validates the document shell, rejects unresolvable and circular references,
 * then builds Schema Model instances for named schemas and every operation's
 * parameters and responses.
 */

import { err, ok, type Result } from '../types/result.js';
import {
  ParseError,
  ValidationError,
  type ErrorContext,
  type SchemaIssue,
} from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { JsonValue, Schema } from '../types/schema.js';
import { createSchema, type RefResolver } from '../schema/create-schema.js';
import { isJsonValue, isPlainRecord } from '../schema/json-value.js';
import {
  RefGraph,
  escapeToken,
  pointerName,
  resolvePointer,
  type Pointer,
} from './ref-graph.js';
import { setOwn } from '../util/own-property.js';

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type SpecFormat = 'swagger' | 'openapi';

export interface ParsedParameter {
  name: string;
  in: string;
  required: boolean;
  description?: string;
  schema?: Schema;
}

export interface ParsedResponse {
  status: string;
  description?: string;
  contentType?: string;
  schema?: Schema;
  example?: JsonValue;
}

export interface ParsedOperation {
  path: string;
  method: HttpMethod;
  operationId?: string;
  summary?: string;
  tags: string[];
  parameters: ParsedParameter[];
  responses: ParsedResponse[];
}

export interface ParsedSpec {
  format: SpecFormat;
  /** Value of the `swagger` or `openapi` field */
  version: string;
  title: string;
  apiVersion: string;
  description?: string;
  /** definitions (2.0) or components.schemas (3.x), by name */
  schemas: Readonly<Record<string, Schema>>;
  operations: ParsedOperation[];
}

export interface ParseSpecOptions {
  /** Custom kinds accepted as schema `type` values */
  customKinds?: readonly string[];
}

type Raw = Readonly<Record<string, unknown>>;

interface RawParameter {
  pointer: Pointer;
  node: Raw;
  /** Pointer to the schema, or undefined for 2.0 parameters described inline */
  schemaPointer?: Pointer;
}

interface RawResponse {
  status: string;
  description?: string;
  contentType?: string;
  schemaPointer?: Pointer;
  example?: JsonValue;
}

interface RawOperation {
  path: string;
  method: HttpMethod;
  node: Raw;
  parameters: RawParameter[];
  responses: RawResponse[];
}

const SWAGGER_VERSION = '2.0';
const OPENAPI_VERSION = /^3\.\d+(\.\d+)?$/;
const DEFAULT_CONTENT_TYPE = 'application/json';

/** Keys a 2.0 non-body parameter shares with the Schema Model */
const INLINE_PARAMETER_KEYS = [
  'type',
  'format',
  'items',
  'enum',
  'default',
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'multipleOf',
  'minLength',
  'maxLength',
  'pattern',
  'minItems',
  'maxItems',
  'uniqueItems',
] as const;

function failure(
  message: string,
  errorCode: ErrorCode = ErrorCode.PARSE_ERROR,
  context?: ErrorContext
): Result<never, ParseError> {
  return err(new ParseError({ message, errorCode, context }));
}

function optionalText(node: Raw, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

class SpecParser {
  private readonly built = new Map<Pointer, Result<Schema, SchemaIssue[]>>();
  private format: SpecFormat = 'openapi';

  constructor(
    private readonly document: Raw,
    private readonly options: ParseSpecOptions
  ) {}

  parse(): Result<ParsedSpec, ParseError> {
    const version = this.version();
    if (version.isErr()) return version;

    const info = this.document.info;
    if (!isPlainRecord(info)) {
      return failure("Missing required 'info' section", ErrorCode.PARSE_ERROR, { section: 'info' });
    }
    const paths = this.document.paths;
    if (!isPlainRecord(paths)) {
      return failure("Missing required 'paths' section", ErrorCode.PARSE_ERROR, { section: 'paths' });
    }

    const operations = this.operations(paths);
    if (operations.isErr()) return operations;
    const named = this.namedSchemaPointers();

    const roots = [
      ...named.values(),
      ...operations.value.flatMap((op) => [
        ...op.parameters.map((p) => p.schemaPointer ?? p.pointer),
        ...op.responses.flatMap((r) => (r.schemaPointer ? [r.schemaPointer] : [])),
      ]),
    ];
    const checked = this.checkReferences(roots);
    if (checked.isErr()) return checked;

    const schemas: Record<string, Schema> = {};
    for (const [name, pointer] of named) {
      const schema = this.buildAt(pointer);
      if (schema.isErr()) return schema;
      setOwn(schemas, name, schema.value);
    }

    const parsed: ParsedOperation[] = [];
    for (const op of operations.value) {
      const operation = this.buildOperation(op);
      if (operation.isErr()) return operation;
      parsed.push(operation.value);
    }

    return ok({
      format: this.format,
      version: version.value,
      title: optionalText(info, 'title') ?? '',
      apiVersion: optionalText(info, 'version') ?? '',
      description: optionalText(info, 'description'),
      schemas,
      operations: parsed,
    });
  }

  private version(): Result<string, ParseError> {
    const { swagger, openapi } = this.document;
    if (swagger !== undefined) {
      this.format = 'swagger';
      return swagger === SWAGGER_VERSION
        ? ok(SWAGGER_VERSION)
        : failure(`Unsupported Swagger version: ${String(swagger)}`, ErrorCode.UNSUPPORTED_SPEC_VERSION, {
            version: swagger,
          });
    }
    if (typeof openapi === 'string' && OPENAPI_VERSION.test(openapi)) {
      this.format = 'openapi';
      return ok(openapi);
    }
    return failure(
      `Unsupported OpenAPI version: ${openapi === undefined ? 'no swagger or openapi field' : String(openapi)}`,
      ErrorCode.UNSUPPORTED_SPEC_VERSION,
      { version: openapi }
    );
  }

  private namedSchemaPointers(): Map<string, Pointer> {
    const base = this.format === 'swagger' ? '#/definitions' : '#/components/schemas';
    const container = resolvePointer(this.document, base);
    const pointers = new Map<string, Pointer>();
    if (isPlainRecord(container)) {
      for (const name of Object.keys(container)) {
        pointers.set(name, `${base}/${escapeToken(name)}`);
      }
    }
    return pointers;
  }

  private checkReferences(roots: readonly Pointer[]): Result<true, ParseError> {
    const graph = new RefGraph(this.document);
    for (const root of roots) {
      const unresolved = graph.add(root);
      if (unresolved) {
        return failure(`Invalid reference: ${unresolved.ref}`, ErrorCode.INVALID_REFERENCE, {
          ref: unresolved.ref,
          schemaPath: unresolved.from,
        });
      }
    }
    const cycle = graph.findCycle();
    if (cycle) {
      return failure(
        `Circular reference detected: ${cycle.map(pointerName).join(' -> ')}`,
        ErrorCode.CIRCULAR_REFERENCE_DETECTED,
        { cycle }
      );
    }
    return ok(true);
  }

  /** Follow one level of `$ref` on a parameter or response object. */
  private deref(node: unknown, pointer: Pointer): Result<{ node: Raw; pointer: Pointer }, ParseError> {
    if (isPlainRecord(node) && typeof node.$ref === 'string') {
      const target = resolvePointer(this.document, node.$ref);
      if (!isPlainRecord(target)) {
        return failure(`Invalid reference: ${node.$ref}`, ErrorCode.INVALID_REFERENCE, {
          ref: node.$ref,
          schemaPath: pointer,
        });
      }
      return ok({ node: target, pointer: node.$ref });
    }
    if (!isPlainRecord(node)) {
      return failure(`Expected an object at ${pointer}`, ErrorCode.PARSE_ERROR, { schemaPath: pointer });
    }
    return ok({ node, pointer });
  }

  private operations(paths: Raw): Result<RawOperation[], ParseError> {
    const out: RawOperation[] = [];
    for (const [path, item] of Object.entries(paths)) {
      if (!isPlainRecord(item)) continue;
      const itemPointer = `#/paths/${escapeToken(path)}`;
      const shared = this.parameters(item.parameters, `${itemPointer}/parameters`);
      if (shared.isErr()) return shared;

      for (const method of HTTP_METHODS) {
        const node = item[method];
        if (!isPlainRecord(node)) continue;
        const pointer = `${itemPointer}/${method}`;
        const own = this.parameters(node.parameters, `${pointer}/parameters`);
        if (own.isErr()) return own;
        const responses = this.responses(node, pointer);
        if (responses.isErr()) return responses;
        out.push({
          path,
          method,
          node,
          parameters: mergeParameters(shared.value, own.value),
          responses: responses.value,
        });
      }
    }
    return ok(out);
  }

  private parameters(list: unknown, pointer: Pointer): Result<RawParameter[], ParseError> {
    if (!Array.isArray(list)) return ok([]);
    const out: RawParameter[] = [];
    for (const [index, entry] of list.entries()) {
      const resolved = this.deref(entry, `${pointer}/${index}`);
      if (resolved.isErr()) return resolved;
      const { node, pointer: at } = resolved.value;
      if (typeof node.name !== 'string' || typeof node.in !== 'string') {
        return failure(`Parameter at ${at} needs a name and a location`, ErrorCode.PARSE_ERROR, {
          schemaPath: at,
        });
      }
      const schemaPointer = isPlainRecord(node.schema) ? `${at}/schema` : undefined;
      out.push({ pointer: at, node, schemaPointer });
    }
    return ok(out);
  }

  private responses(operation: Raw, pointer: Pointer): Result<RawResponse[], ParseError> {
    const responses = operation.responses;
    if (!isPlainRecord(responses)) return ok([]);
    const out: RawResponse[] = [];
    for (const [status, entry] of Object.entries(responses)) {
      const resolved = this.deref(entry, `${pointer}/responses/${escapeToken(status)}`);
      if (resolved.isErr()) return resolved;
      const { node, pointer: at } = resolved.value;
      const description = optionalText(node, 'description');

      if (this.format === 'swagger') {
        const contentType = firstString(operation.produces) ?? firstString(this.document.produces) ?? DEFAULT_CONTENT_TYPE;
        const examples = node.examples;
        const example = isPlainRecord(examples) ? examples[contentType] : undefined;
        out.push({
          status,
          description,
          contentType,
          schemaPointer: isPlainRecord(node.schema) ? `${at}/schema` : undefined,
          example: isJsonValue(example) ? example : undefined,
        });
        continue;
      }

      const content = node.content;
      if (!isPlainRecord(content) || Object.keys(content).length === 0) {
        out.push({ status, description });
        continue;
      }
      for (const [contentType, media] of Object.entries(content)) {
        if (!isPlainRecord(media)) continue;
        const example = mediaExample(media);
        out.push({
          status,
          description,
          contentType,
          schemaPointer: isPlainRecord(media.schema)
            ? `${at}/content/${escapeToken(contentType)}/schema`
            : undefined,
          example,
        });
      }
    }
    return ok(out);
  }

  private buildOperation(op: RawOperation): Result<ParsedOperation, ParseError> {
    const parameters: ParsedParameter[] = [];
    for (const raw of op.parameters) {
      const schema = this.parameterSchema(raw);
      if (schema.isErr()) return schema;
      parameters.push({
        name: String(raw.node.name),
        in: String(raw.node.in),
        required: raw.node.required === true || raw.node.in === 'path',
        description: optionalText(raw.node, 'description'),
        schema: schema.value,
      });
    }

    const responses: ParsedResponse[] = [];
    for (const raw of op.responses) {
      let schema: Schema | undefined;
      if (raw.schemaPointer) {
        const built = this.buildAt(raw.schemaPointer);
        if (built.isErr()) return built;
        schema = built.value;
      }
      responses.push({
        status: raw.status,
        description: raw.description,
        contentType: raw.contentType,
        schema,
        example: raw.example,
      });
    }

    const tags = Array.isArray(op.node.tags)
      ? op.node.tags.filter((tag: unknown): tag is string => typeof tag === 'string')
      : [];
    return ok({
      path: op.path,
      method: op.method,
      operationId: optionalText(op.node, 'operationId'),
      summary: optionalText(op.node, 'summary'),
      tags,
      parameters,
      responses,
    });
  }

  private parameterSchema(raw: RawParameter): Result<Schema | undefined, ParseError> {
    if (raw.schemaPointer) return this.buildAt(raw.schemaPointer);
    if (this.format !== 'swagger' || typeof raw.node.type !== 'string' || raw.node.type === 'file') {
      return ok(undefined);
    }
    const inline: Record<string, unknown> = {};
    for (const key of INLINE_PARAMETER_KEYS) {
      if (raw.node[key] !== undefined) inline[key] = raw.node[key];
    }
    const built = createSchema(inline, this.schemaOptions());
    return built.isErr() ? this.invalidSchema(raw.pointer, built.error) : ok(built.value);
  }

  private buildAt(pointer: Pointer): Result<Schema, ParseError> {
    const built = this.schemaAt(pointer);
    return built.isErr() ? this.invalidSchema(pointer, built.error) : built;
  }

  /** Memoized construction; references resolve through the same memo. */
  private schemaAt(pointer: Pointer): Result<Schema, SchemaIssue[]> {
    const cached = this.built.get(pointer);
    if (cached) return cached;
    const result = createSchema(resolvePointer(this.document, pointer), this.schemaOptions());
    this.built.set(pointer, result);
    return result;
  }

  private schemaOptions(): { resolveRef: RefResolver; customKinds?: readonly string[] } {
    const resolveRef: RefResolver = (ref) => {
      const target = this.schemaAt(ref);
      if (target.isOk()) return target;
      const [first] = target.error;
      return err([
        {
          path: ref,
          message: `Invalid reference: ${ref}${first ? ` (${first.message})` : ''}`,
        },
      ]);
    };
    return { resolveRef, customKinds: this.options.customKinds };
  }

  private invalidSchema(pointer: Pointer, issues: SchemaIssue[]): Result<never, ParseError> {
    const cause = new ValidationError(issues);
    return err(
      new ParseError({
        message: `Invalid schema at ${pointer}: ${cause.message}`,
        errorCode: ErrorCode.INVALID_SCHEMA_STRUCTURE,
        context: { schemaPath: pointer, issues },
        cause,
      })
    );
  }
}

function firstString(value: unknown): string | undefined {
  return Array.isArray(value) && typeof value[0] === 'string' ? value[0] : undefined;
}

function mediaExample(media: Raw): JsonValue | undefined {
  if (isJsonValue(media.example)) return media.example;
  const examples = media.examples;
  if (!isPlainRecord(examples)) return undefined;
  const preferred = examples.default ?? Object.values(examples)[0];
  if (isPlainRecord(preferred) && isJsonValue(preferred.value)) return preferred.value;
  return undefined;
}

/** Operation parameters override path-level ones with the same name and location. */
function mergeParameters(shared: RawParameter[], own: RawParameter[]): RawParameter[] {
  const key = (p: RawParameter): string => `${String(p.node.in)}:${String(p.node.name)}`;
  const overridden = new Set(own.map(key));
  return [...shared.filter((p) => !overridden.has(key(p))), ...own];
}

/**
 * Parse an in-memory Swagger 2.0 or OpenAPI 3.x document.
 * Never throws; every problem is reported as a ParseError.
 */
export function parseSpecDocument(
  document: unknown,
  options: ParseSpecOptions = {}
): Result<ParsedSpec, ParseError> {
  if (!isPlainRecord(document)) {
    return failure('Invalid specification document: expected an object');
  }
  return new SpecParser(document, options).parse();
}
