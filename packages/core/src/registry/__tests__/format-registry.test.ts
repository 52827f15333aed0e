import { describe, it, expect } from 'vitest';
import { FormatRegistry, type FormatGenerator } from '../format-registry.js';
import { createDefaultFormatRegistry } from '../../generator/formats/index.js';

const sku: FormatGenerator = {
  name: 'sku',
  aliases: ['stock-code'],
  generate: () => 'SKU-0001',
  validate: (value) => /^SKU-\d{4}$/.test(value),
  getExamples: () => ['SKU-0001'],
};

describe('FormatRegistry', () => {
  it('resolves names, aliases and case-insensitive matches', () => {
    const registry = new FormatRegistry([sku]);
    expect(registry.get('sku')).toBe(sku);
    expect(registry.get('stock-code')).toBe(sku);
    expect(registry.get('SKU')).toBe(sku);
    expect(registry.get('isbn')).toBeUndefined();
  });

  it('lists primary names only', () => {
    const registry = createDefaultFormatRegistry();
    expect(registry.getRegisteredFormats()).toEqual([
      'binary',
      'byte',
      'date',
      'date-time',
      'email',
      'hostname',
      'ipv4',
      'ipv6',
      'password',
      'uri',
      'uuid',
    ]);
    expect(registry.supports('url')).toBe(true);
    expect(registry.supports('guid')).toBe(true);
  });

  it('is complete as soon as it is built', () => {
    expect(new FormatRegistry().getRegisteredFormats()).toEqual([]);
    expect(createDefaultFormatRegistry().supports('email')).toBe(true);
  });

  it('unregisters a generator with its aliases', () => {
    const registry = new FormatRegistry([sku]);
    expect(registry.unregister('sku')).toBe(true);
    expect(registry.supports('stock-code')).toBe(false);
    expect(registry.unregister('sku')).toBe(false);
  });

  it('does not let an alias shadow a registered name', () => {
    const shadow: FormatGenerator = { ...sku, name: 'other', aliases: ['sku'] };
    const registry = new FormatRegistry([sku, shadow]);
    expect(registry.get('sku')).toBe(sku);
  });

  it('clones independently', () => {
    const original = new FormatRegistry([sku]);
    const copy = original.clone();
    copy.unregister('sku');
    expect(original.supports('sku')).toBe(true);
  });
});
