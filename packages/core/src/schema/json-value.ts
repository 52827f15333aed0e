import type { JsonValue } from '../types/schema.js';

export function isPlainRecord(
  value: unknown
): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** True when the value is representable as JSON without loss. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every((item: unknown) => isJsonValue(item));
      }
      return Object.values(value).every((item: unknown) => isJsonValue(item));
    default:
      return false;
  }
}

/** JSON kind name used in messages. */
export function jsonKind(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  return typeof value;
}

export function codePointLength(value: string): number {
  return Array.from(value).length;
}
