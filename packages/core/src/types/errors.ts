/**
 * Error hierarchy for schemock
 * Structured errors with stable codes, context and safe serialization
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  path?: string; // instance location, e.g. '/users/0/name'
  schemaPath?: string; // schema location, e.g. '#/definitions/User'
  ref?: string;
  value?: unknown; // may contain PII, redacted in prod serialization
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string };
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  path?: string;
  schemaPath?: string;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

function redactValue(val: unknown): unknown {
  if (Array.isArray(val)) return val.map(redactValue);
  if (val !== null && typeof val === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all schemock errors
 */
export abstract class SchemockError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    super(params.message, { cause: params.cause });
    this.name = new.target.name;
    this.errorCode = params.errorCode;
    this.severity = params.severity ?? 'error';
    this.context = params.context;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? redactContext(this.context) : this.context,
    };
    if (this.cause) {
      base.cause = { name: this.cause.name, message: this.cause.message };
    }
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      path: this.context?.path,
      schemaPath: this.context?.schemaPath,
    };
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

function redactContext(context?: ErrorContext): ErrorContext | undefined {
  if (!context) return context;
  const redacted: ErrorContext = { ...context };
  if ('value' in redacted) {
    redacted.value = redactValue(redacted.value);
  }
  return redacted;
}

/** One schema construction problem, addressed by a JSON-pointer-like path. */
export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Schema construction failed; carries every collected issue in order.
 */
export class ValidationError extends SchemockError {
  public readonly issues: readonly SchemaIssue[];

  constructor(
    issues: readonly SchemaIssue[],
    params: Partial<Omit<ErrorParams, 'message'>> = {}
  ) {
    const first = issues[0];
    const summary = first
      ? `${first.message} at ${first.path || '#'}${issues.length > 1 ? ` (+${issues.length - 1} more)` : ''}`
      : 'Invalid schema';
    super({
      message: summary,
      errorCode: params.errorCode ?? ErrorCode.INVALID_SCHEMA_STRUCTURE,
      severity: params.severity,
      context: { issueCount: issues.length, ...(params.context ?? {}) },
      cause: params.cause,
    });
    this.issues = issues;
  }
}

/**
 * Stable message prefixes carried by generation failures.
 */
export const GeneratorMessage = {
  MISSING_SCHEMA: 'Missing schema specification',
  UNSUPPORTED_TYPE: 'Unsupported data type',
  UNSUPPORTED_FORMAT: 'Unsupported data format',
  MAX_DEPTH: 'Maximum generation depth exceeded',

  UNSUPPORTED_STRING_FORMAT: 'Unsupported string format',
  INVALID_PATTERN: 'Invalid regular expression pattern',
  INVALID_LENGTH: 'Invalid length constraints',

  INVALID_NUMERIC_BOUNDS: 'Invalid numeric bounds',
  INVALID_MULTIPLE_OF: 'Invalid multipleOf value',
  UNSUPPORTED_NUMBER_FORMAT: 'Unsupported number format',

  INVALID_ITEMS: 'Invalid items specification',
  INVALID_ARRAY_LENGTH: 'Invalid array length constraints',
  UNIQUE_ITEMS_INFEASIBLE: 'Cannot generate unique items with given constraints',

  INVALID_PROPERTIES: 'Invalid properties specification',
  REQUIRED_FIELD: 'Cannot generate required field',
  INVALID_DEPENDENCY: 'Invalid property dependency',
  INVALID_PATTERN_PROPERTY: 'Invalid pattern property specification',
  PROPERTY_COUNT: 'Cannot satisfy property count constraints',
} as const;

export type GeneratorMessagePrefix =
  (typeof GeneratorMessage)[keyof typeof GeneratorMessage];

export interface GeneratorErrorParams {
  prefix: GeneratorMessagePrefix;
  detail?: string;
  path?: string;
  constraint?: string;
  errorCode?: ErrorCode;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Runtime inability to produce a value for an otherwise valid schema.
 * The message always begins with one of the GeneratorMessage prefixes.
 */
export class GeneratorError extends SchemockError {
  public readonly prefix: GeneratorMessagePrefix;

  constructor(params: GeneratorErrorParams) {
    super({
      message: params.detail
        ? `${params.prefix}: ${params.detail}`
        : params.prefix,
      errorCode: params.errorCode ?? ErrorCode.CONSTRAINT_VIOLATION,
      context: {
        path: params.path,
        constraint: params.constraint,
        ...(params.context ?? {}),
      },
      cause: params.cause,
    });
    this.prefix = params.prefix;
  }

  get path(): string | undefined {
    return this.context?.path;
  }

  get constraint(): string | undefined {
    const constraint = this.context?.constraint;
    return typeof constraint === 'string' ? constraint : undefined;
  }
}

/**
 * Specification document errors (version, structure, references)
 */
export class ParseError extends SchemockError {
  constructor(params: {
    message: string;
    errorCode?: ErrorCode;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends SchemockError {
  constructor(params: {
    message: string;
    setting?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { setting: params.setting, ...(params.context ?? {}) },
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

export function isSchemockError(error: unknown): error is SchemockError {
  return error instanceof SchemockError;
}
