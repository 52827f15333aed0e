/**
 * Nested dispatch: resolves references, enforces the depth cap, and routes a
 * schema to the strategy registered for its kind.
 */

import { err } from '../types/result.js';
import { GeneratorError, GeneratorMessage } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import {
  resolveSchema,
  schemaKind,
  type Schema,
} from '../types/schema.js';
import { DEFAULT_MOCK_CONFIG } from '../types/options.js';
import {
  StrategyRegistry,
  createDefaultStrategies,
} from '../registry/strategy-registry.js';
import { silentLogger, type Logger } from '../util/logger.js';
import type { Rng } from '../util/rng.js';
import type { GenerationContext, GenerationResult } from './data-generator.js';

export interface DispatchOptions {
  maxDepth: number;
  preferExamples: boolean;
  logger: Logger;
}

class DispatchContext implements GenerationContext {
  constructor(
    private readonly registry: StrategyRegistry,
    private readonly options: DispatchOptions,
    readonly path: string,
    readonly depth: number
  ) {}

  get maxDepth(): number {
    return this.options.maxDepth;
  }

  get preferExamples(): boolean {
    return this.options.preferExamples;
  }

  get logger(): Logger {
    return this.options.logger;
  }

  generate(schema: Schema, rng: Rng, segment: string | number): GenerationResult {
    const child = new DispatchContext(
      this.registry,
      this.options,
      `${this.path}/${escapeSegment(String(segment))}`,
      this.depth + 1
    );
    return dispatch(schema, rng, child, this.registry);
  }
}

function escapeSegment(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** Route one schema at the location described by `context`. */
export function dispatch(
  schema: Schema,
  rng: Rng,
  context: GenerationContext,
  registry: StrategyRegistry
): GenerationResult {
  if (context.depth > context.maxDepth) {
    return err(
      new GeneratorError({
        prefix: GeneratorMessage.MAX_DEPTH,
        detail: `depth ${context.depth} exceeds ${context.maxDepth}`,
        path: context.path,
        errorCode: ErrorCode.GENERATION_LIMIT_EXCEEDED,
      })
    );
  }

  const target = resolveSchema(schema);
  const kind = schemaKind(target);
  const strategy = registry.get(kind);
  if (!strategy) {
    return err(
      new GeneratorError({
        prefix: GeneratorMessage.UNSUPPORTED_TYPE,
        detail: kind,
        path: context.path,
        constraint: 'type',
        errorCode: ErrorCode.UNSUPPORTED_KIND,
      })
    );
  }
  if ('format' in target && target.format !== undefined && !strategy.supportsFormat(target.format)) {
    return err(
      new GeneratorError({
        prefix: GeneratorMessage.UNSUPPORTED_FORMAT,
        detail: `${target.format} for ${kind}`,
        path: context.path,
        constraint: 'format',
        errorCode: ErrorCode.UNSUPPORTED_FORMAT,
      })
    );
  }
  return strategy.generate(target, rng, context);
}

/** Root context over a registry; child contexts are derived on each nested call. */
export function createGenerationContext(
  registry: StrategyRegistry = new StrategyRegistry(createDefaultStrategies()),
  options: Partial<DispatchOptions> = {}
): GenerationContext {
  return new DispatchContext(
    registry,
    {
      maxDepth: options.maxDepth ?? DEFAULT_MOCK_CONFIG.maxDepth,
      preferExamples: options.preferExamples ?? DEFAULT_MOCK_CONFIG.preferExamples,
      logger: options.logger ?? silentLogger,
    },
    '',
    0
  );
}
