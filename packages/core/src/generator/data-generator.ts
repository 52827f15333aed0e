/**
 * Generator strategy contract and shared base class
 * Every kind of value (string, number, array, ...) is produced by one strategy.
 */

import { err, ok, type Result } from '../types/result.js';
import {
  GeneratorError,
  GeneratorMessage,
  type GeneratorMessagePrefix,
} from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { JsonValue, Schema, TypedSchema } from '../types/schema.js';
import type { Logger } from '../util/logger.js';
import type { Rng } from '../util/rng.js';

/**
 * Generation context handed to strategies.
 * Carries the location being generated and a way back into the dispatcher
 * for nested schemas.
 */
export interface GenerationContext {
  /** Instance path, e.g. '/users/0/name' ('' at the root) */
  readonly path: string;
  readonly depth: number;
  readonly maxDepth: number;
  /** Return a schema's example before synthesizing */
  readonly preferExamples: boolean;
  readonly logger: Logger;

  /**
   * Generate a child value. `segment` is appended to the path; the caller
   * forks the rng so siblings do not share a stream.
   */
  generate(
    schema: Schema,
    rng: Rng,
    segment: string | number
  ): Result<JsonValue, GeneratorError>;
}

export type GenerationResult = Result<JsonValue, GeneratorError>;

/**
 * Capability implemented by every kind of generator, built in or registered
 * at runtime.
 */
export interface GeneratorStrategy {
  /** Registry key: a schema type or a custom kind */
  readonly kind: string;

  supportsFormat(format: string): boolean;

  generate(
    schema: TypedSchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult;
}

/**
 * Base class for the built-in strategies. Handles enum draws and preferred
 * examples, then delegates to produce() for the kind-specific work.
 */
export abstract class DataGenerator<S extends TypedSchema>
  implements GeneratorStrategy
{
  abstract readonly kind: string;

  /** Narrow a dispatched schema to the variant this strategy handles */
  protected abstract accepts(schema: TypedSchema): schema is S;

  protected abstract produce(
    schema: S,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult;

  supportsFormat(_format: string): boolean {
    return false;
  }

  generate(
    schema: TypedSchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    if (!this.accepts(schema)) {
      return err(
        new GeneratorError({
          prefix: GeneratorMessage.UNSUPPORTED_TYPE,
          detail: `${this.kind} generator cannot handle type ${schema.type}`,
          path: context.path,
          constraint: 'type',
          errorCode: ErrorCode.UNSUPPORTED_KIND,
        })
      );
    }

    if (schema.enum && schema.enum.length > 0) {
      return ok(rng.fork('enum').pick(schema.enum));
    }

    if (context.preferExamples) {
      const example = pickExample(schema, rng);
      if (example !== undefined) return ok(example);
    }

    return this.produce(schema, rng, context);
  }

  protected fail(
    prefix: GeneratorMessagePrefix,
    context: GenerationContext,
    detail?: string,
    constraint?: string
  ): Result<never, GeneratorError> {
    return err(
      new GeneratorError({ prefix, detail, path: context.path, constraint })
    );
  }
}

function pickExample(schema: TypedSchema, rng: Rng): JsonValue | undefined {
  if (schema.example !== undefined) return schema.example;
  if (schema.examples && schema.examples.length > 0) {
    return rng.fork('examples').pick(schema.examples);
  }
  return undefined;
}
