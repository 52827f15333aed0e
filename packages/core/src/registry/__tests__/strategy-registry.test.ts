import { describe, it, expect } from 'vitest';
import { StrategyRegistry, createDefaultStrategies } from '../strategy-registry.js';
import type { GeneratorStrategy } from '../../generator/data-generator.js';
import { ok } from '../../types/result.js';

const constantTrue: GeneratorStrategy = {
  kind: 'boolean',
  supportsFormat: () => false,
  generate: () => ok(true),
};

describe('StrategyRegistry', () => {
  it('holds one strategy per built-in type', () => {
    const registry = new StrategyRegistry(createDefaultStrategies());
    expect(registry.kinds()).toEqual(['array', 'boolean', 'integer', 'null', 'number', 'object', 'string']);
  });

  it('replaces the strategy of a kind already registered', () => {
    const registry = new StrategyRegistry(createDefaultStrategies());
    registry.register(constantTrue);
    expect(registry.get('boolean')).toBe(constantTrue);
    expect(registry.kinds()).toHaveLength(7);
  });

  it('removes kinds', () => {
    const registry = new StrategyRegistry([constantTrue]);
    expect(registry.unregister('boolean')).toBe(true);
    expect(registry.unregister('boolean')).toBe(false);
    expect(registry.has('boolean')).toBe(false);
    expect(registry.get('boolean')).toBeUndefined();
  });
});
