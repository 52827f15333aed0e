/**
 * Strategy Registry
 * Maps a schema kind (a type or a registered custom kind) to its generator.
 */

import type { GeneratorStrategy } from '../generator/data-generator.js';
import { createDefaultFormatRegistry } from '../generator/formats/index.js';
import { ArrayGenerator } from '../generator/types/array-generator.js';
import {
  BooleanGenerator,
  NullGenerator,
} from '../generator/types/boolean-generator.js';
import {
  DEFAULT_NUMBER_RANGES,
  NumberGenerator,
  type NumberRanges,
} from '../generator/types/number-generator.js';
import { ObjectGenerator } from '../generator/types/object-generator.js';
import { StringGenerator } from '../generator/types/string-generator.js';
import type { FormatRegistry } from './format-registry.js';

export class StrategyRegistry {
  private readonly strategies = new Map<string, GeneratorStrategy>();

  constructor(strategies: Iterable<GeneratorStrategy> = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  /** Adds a kind, or replaces the strategy already registered for it. */
  register(strategy: GeneratorStrategy): void {
    this.strategies.set(strategy.kind, strategy);
  }

  unregister(kind: string): boolean {
    return this.strategies.delete(kind);
  }

  get(kind: string): GeneratorStrategy | undefined {
    return this.strategies.get(kind);
  }

  has(kind: string): boolean {
    return this.strategies.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.strategies.keys()).sort();
  }
}

export function createDefaultStrategies(
  formats: FormatRegistry = createDefaultFormatRegistry(),
  ranges: NumberRanges = DEFAULT_NUMBER_RANGES
): GeneratorStrategy[] {
  return [
    new StringGenerator(formats),
    new NumberGenerator('number', ranges),
    new NumberGenerator('integer', ranges),
    new BooleanGenerator(),
    new NullGenerator(),
    new ArrayGenerator(),
    new ObjectGenerator(),
  ];
}
