/**
 * UUID Format Generator
 * RFC 4122 version 4 shape: version nibble 4, variant nibble one of 8, 9, a, b
 */

import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';

const HEX = '0123456789abcdef';
const UUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function hexString(rng: Rng, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) out += HEX[rng.int(0, 15)];
  return out;
}

export class UUIDGenerator implements FormatGenerator {
  readonly name = 'uuid';
  readonly aliases = ['guid'];

  generate(rng: Rng): string {
    const variant = rng.pick(['8', '9', 'a', 'b']);
    return [
      hexString(rng, 8),
      hexString(rng, 4),
      `4${hexString(rng, 3)}`,
      `${variant}${hexString(rng, 3)}`,
      hexString(rng, 12),
    ].join('-');
  }

  validate(value: string): boolean {
    return UUID_RE.test(value);
  }

  getExamples(): readonly string[] {
    return [
      '550e8400-e29b-41d4-a716-446655440000',
      'f47ac10b-58cc-4372-a567-0e02b2c3d479',
    ];
  }
}
