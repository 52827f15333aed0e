import { Buffer } from 'node:buffer';

export interface CanonicalJSONResult {
  text: string;
  buffer: Buffer;
  byteLength: number;
}

function normalizeNumber(value: number): string {
  if (Object.is(value, -0)) return '0';
  if (!Number.isFinite(value)) return 'null';
  return JSON.stringify(value);
}

/**
 * Serialize a value with sorted object keys. Undefined members are dropped,
 * -0 becomes 0 and bigint values are written as decimal strings, so two
 * structurally equal values always produce the same text.
 */
export function canonicalJSON(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  switch (typeof value) {
    case 'number':
      return normalizeNumber(value);
    case 'bigint':
      return JSON.stringify(value.toString());
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'object':
      break;
    default:
      return 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJSON(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== 'function')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, v]) => `${JSON.stringify(key)}:${canonicalJSON(v)}`);
  return `{${entries.join(',')}}`;
}

export function canonicalizeForHash(value: unknown): CanonicalJSONResult {
  const text = canonicalJSON(value);
  const buffer = Buffer.from(text, 'utf8');
  return {
    text,
    buffer,
    byteLength: buffer.byteLength,
  };
}
