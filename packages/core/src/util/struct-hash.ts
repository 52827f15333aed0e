import { createHash } from 'node:crypto';
import { canonicalizeForHash } from './canonical-json.js';

export interface StructuralHashResult {
  digest: string;
  canonical: string;
}

export function structuralHash(value: unknown): StructuralHashResult {
  const canonical = canonicalizeForHash(value);
  const digest = createHash('sha256').update(canonical.buffer).digest('hex');
  return { digest, canonical: canonical.text };
}

/** Deep value equality through the canonical form. */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  return canonicalizeForHash(a).text === canonicalizeForHash(b).text;
}
