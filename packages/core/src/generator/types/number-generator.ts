/**
 * Number Generator
 * Integers and floats within inclusive or exclusive bounds; multipleOf is
 * handled with exact rational arithmetic so decimal steps never drift.
 */

import { ok, type Result } from '../../types/result.js';
import { GeneratorMessage, type GeneratorError } from '../../types/errors.js';
import type { NumericSchema, TypedSchema } from '../../types/schema.js';
import {
  ceilDiv,
  floorDiv,
  ratFromNumber,
  ratToNumber,
  reduce,
  type Rat,
} from '../../util/rational.js';
import type { Rng } from '../../util/rng.js';
import {
  DataGenerator,
  type GenerationContext,
  type GenerationResult,
} from '../data-generator.js';

export interface NumberRange {
  readonly min: number;
  readonly max: number;
  /** Values drawn under this format are whole numbers */
  readonly integer: boolean;
}

export type NumberRanges = Readonly<Record<string, NumberRange>>;

/** Default bounds per format when the schema gives none. */
export const DEFAULT_NUMBER_RANGES: NumberRanges = Object.freeze({
  int32: { min: -(2 ** 31), max: 2 ** 31 - 1, integer: true },
  int64: { min: -(2 ** 63), max: 2 ** 63, integer: true },
  float: { min: -3.4e38, max: 3.4e38, integer: false },
  double: { min: -Number.MAX_VALUE, max: Number.MAX_VALUE, integer: false },
});

const INTEGER_FALLBACK: NumberRange = DEFAULT_NUMBER_RANGES.int32;
const NUMBER_FALLBACK: NumberRange = { min: -1e6, max: 1e6, integer: false };
const OPEN_BOUND_SPAN = 1000;
const EXCLUSIVE_RESAMPLES = 8;

interface Bounds {
  lo: number;
  hi: number;
  exclusiveLo: boolean;
  exclusiveHi: boolean;
}

export class NumberGenerator extends DataGenerator<NumericSchema> {
  readonly kind: string;

  constructor(
    kind: 'number' | 'integer' = 'number',
    private readonly ranges: NumberRanges = DEFAULT_NUMBER_RANGES
  ) {
    super();
    this.kind = kind;
  }

  protected accepts(schema: TypedSchema): schema is NumericSchema {
    return schema.type === 'number' || schema.type === 'integer';
  }

  override supportsFormat(format: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.ranges, format);
  }

  protected produce(
    schema: NumericSchema,
    rng: Rng,
    context: GenerationContext
  ): GenerationResult {
    let range: NumberRange | undefined;
    if (schema.format !== undefined) {
      range = this.supportsFormat(schema.format) ? this.ranges[schema.format] : undefined;
      if (!range) {
        return this.fail(GeneratorMessage.UNSUPPORTED_NUMBER_FORMAT, context, schema.format, 'format');
      }
    }
    const integer = schema.type === 'integer' || range?.integer === true;
    range ??= integer ? INTEGER_FALLBACK : NUMBER_FALLBACK;

    const { multipleOf } = schema;
    if (multipleOf !== undefined && !(multipleOf > 0 && Number.isFinite(multipleOf))) {
      return this.fail(
        GeneratorMessage.INVALID_MULTIPLE_OF,
        context,
        `${multipleOf} must be greater than 0`,
        'multipleOf'
      );
    }

    const bounds = resolveBounds(schema, range, integer);
    if (bounds.lo > bounds.hi) {
      return this.fail(
        GeneratorMessage.INVALID_NUMERIC_BOUNDS,
        context,
        `minimum ${bounds.lo} exceeds maximum ${bounds.hi}`,
        'minimum'
      );
    }

    if (multipleOf !== undefined) {
      return this.multiple(bounds, multipleOf, integer, rng, context);
    }
    return integer
      ? this.integer(bounds, rng, context)
      : this.float(bounds, rng, context);
  }

  private integer(
    bounds: Bounds,
    rng: Rng,
    context: GenerationContext
  ): Result<number, GeneratorError> {
    const lower = bounds.exclusiveLo ? Math.floor(bounds.lo) + 1 : Math.ceil(bounds.lo);
    const upper = bounds.exclusiveHi ? Math.ceil(bounds.hi) - 1 : Math.floor(bounds.hi);
    if (lower > upper) {
      return this.fail(
        GeneratorMessage.INVALID_NUMERIC_BOUNDS,
        context,
        `no integer between ${bounds.lo} and ${bounds.hi}`,
        'minimum'
      );
    }
    return ok(rng.int(lower, upper));
  }

  private float(
    bounds: Bounds,
    rng: Rng,
    context: GenerationContext
  ): Result<number, GeneratorError> {
    const { lo, hi } = bounds;
    if (lo === hi) {
      if (bounds.exclusiveLo || bounds.exclusiveHi) {
        return this.fail(GeneratorMessage.INVALID_NUMERIC_BOUNDS, context, `empty range at ${lo}`, 'minimum');
      }
      return ok(lo);
    }
    const outside = (v: number): boolean =>
      (bounds.exclusiveLo && v <= lo) || (bounds.exclusiveHi && v >= hi) || v < lo || v > hi;

    for (let i = 0; i < EXCLUSIVE_RESAMPLES; i++) {
      const u = rng.float();
      // lerp written to avoid overflow across the full double range
      const value = lo * (1 - u) + hi * u;
      if (!outside(value)) return ok(normalizeZero(value));
    }
    const mid = lo / 2 + hi / 2;
    if (outside(mid)) {
      return this.fail(GeneratorMessage.INVALID_NUMERIC_BOUNDS, context, `no number strictly between ${lo} and ${hi}`, 'minimum');
    }
    return ok(normalizeZero(mid));
  }

  /**
   * Draw k and return k * step, where step is multipleOf (or, for integers,
   * the smallest integer multiple of it).
   */
  private multiple(
    bounds: Bounds,
    multipleOf: number,
    integer: boolean,
    rng: Rng,
    context: GenerationContext
  ): Result<number, GeneratorError> {
    const m = ratFromNumber(multipleOf);
    const step: Rat = integer ? { p: m.p, q: 1n } : m;
    const lo = ratFromNumber(bounds.lo);
    const hi = ratFromNumber(bounds.hi);

    // k * step.p / step.q >= lo.p / lo.q  <=>  k >= lo.p * step.q / (lo.q * step.p)
    let kMin = ceilDiv(lo.p * step.q, lo.q * step.p);
    let kMax = floorDiv(hi.p * step.q, hi.q * step.p);
    if (bounds.exclusiveLo && kMin * step.p * lo.q === lo.p * step.q) kMin += 1n;
    if (bounds.exclusiveHi && kMax * step.p * hi.q === hi.p * step.q) kMax -= 1n;

    if (kMin > kMax) {
      return this.fail(
        GeneratorMessage.INVALID_NUMERIC_BOUNDS,
        context,
        `no multiple of ${multipleOf} between ${bounds.lo} and ${bounds.hi}`,
        'multipleOf'
      );
    }
    const k = rng.bigint(kMin, kMax);
    return ok(normalizeZero(ratToNumber(reduce(k * step.p, step.q))));
  }
}

function resolveBounds(
  schema: NumericSchema,
  range: NumberRange,
  integer: boolean
): Bounds {
  const defaultMin = integer ? Math.max(range.min, Number.MIN_SAFE_INTEGER) : range.min;
  const defaultMax = integer ? Math.min(range.max, Number.MAX_SAFE_INTEGER) : range.max;
  const { minimum, maximum } = schema;

  let lo = minimum ?? defaultMin;
  let hi = maximum ?? defaultMax;
  // one-sided bounds outside the default range keep a window next to the given bound
  if (minimum !== undefined && maximum === undefined && lo > hi) hi = lo + OPEN_BOUND_SPAN;
  if (maximum !== undefined && minimum === undefined && lo > hi) lo = hi - OPEN_BOUND_SPAN;

  return {
    lo,
    hi,
    exclusiveLo: minimum !== undefined && schema.exclusiveMinimum === true,
    exclusiveHi: maximum !== undefined && schema.exclusiveMaximum === true,
  };
}

function normalizeZero(value: number): number {
  return Object.is(value, -0) ? 0 : value;
}
