/**
 * Byte, binary and password formats
 */

import { Buffer } from 'node:buffer';
import type { FormatGenerator } from '../../registry/format-registry.js';
import type { Rng } from '../../util/rng.js';

function randomBytes(rng: Rng, length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) bytes[i] = rng.int(0, 255);
  return bytes;
}

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** base64-encoded octets */
export class ByteGenerator implements FormatGenerator {
  readonly name = 'byte';

  generate(rng: Rng): string {
    return Buffer.from(randomBytes(rng, rng.int(3, 24))).toString('base64');
  }

  validate(value: string): boolean {
    return BASE64_RE.test(value);
  }

  getExamples(): readonly string[] {
    return ['U2NoZW1vY2s=', 'AAECAwQF'];
  }
}

/** Raw octets, one char per byte */
export class BinaryGenerator implements FormatGenerator {
  readonly name = 'binary';

  generate(rng: Rng): string {
    return Buffer.from(randomBytes(rng, rng.int(4, 32))).toString('latin1');
  }

  validate(value: string): boolean {
    return Array.from(value).every((ch) => (ch.codePointAt(0) ?? 0) <= 0xff);
  }

  getExamples(): readonly string[] {
    return ['\u0000\u0001ÿ'];
  }
}

export const PASSWORD_SYMBOLS = '@$!%*#?&';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const DIGITS = '0123456789';
const PASSWORD_ALPHABET = UPPER + LOWER + DIGITS + PASSWORD_SYMBOLS;

/**
 * At least 8 characters with one upper, one lower, one digit and one symbol
 */
export class PasswordGenerator implements FormatGenerator {
  readonly name = 'password';

  generate(rng: Rng): string {
    const length = rng.int(10, 16);
    const chars = [
      rng.pick(Array.from(UPPER)),
      rng.pick(Array.from(LOWER)),
      rng.pick(Array.from(DIGITS)),
      rng.pick(Array.from(PASSWORD_SYMBOLS)),
    ];
    const alphabet = Array.from(PASSWORD_ALPHABET);
    while (chars.length < length) chars.push(rng.pick(alphabet));
    return rng.shuffle(chars).join('');
  }

  validate(value: string): boolean {
    return (
      /^[A-Za-z\d@$!%*#?&]{8,}$/.test(value) &&
      /[A-Z]/.test(value) &&
      /[a-z]/.test(value) &&
      /\d/.test(value) &&
      /[@$!%*#?&]/.test(value)
    );
  }

  getExamples(): readonly string[] {
    return ['Str0ng!Passw0rd', 'aB3$efgh'];
  }
}
