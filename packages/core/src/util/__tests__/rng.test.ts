import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { fnv1a32, mix32, Rng } from '../rng.js';

const SEED = 424242;

describe('RNG utilities', () => {
  describe('fnv1a32', () => {
    it('computes correct FNV-1a hash for known strings', () => {
      expect(fnv1a32('')).toBe(2166136261);
      expect(fnv1a32('a')).toBe(3826002220);
      expect(fnv1a32('hello')).toBe(1335831723);
    });

    it('returns uint32 values', () => {
      const hash = fnv1a32('/properties/name');
      expect(hash).toBe(hash >>> 0);
    });
  });

  describe('Rng', () => {
    it('produces the same sequence for the same seed and label', () => {
      const a = new Rng(SEED, 'user');
      const b = new Rng(SEED, 'user');
      const seqA = Array.from({ length: 5 }, () => a.next());
      const seqB = Array.from({ length: 5 }, () => b.next());
      expect(seqA).toEqual(seqB);
    });

    it('separates streams by label', () => {
      expect(new Rng(SEED, 'a').next()).not.toBe(new Rng(SEED, 'b').next());
    });

    it('finalizes hashes so that nearby inputs diverge', () => {
      expect(mix32(0)).toBe(0);
      expect(mix32(1)).not.toBe(mix32(2));
    });

    it('spreads nearby seeds across a small range', () => {
      const draws = new Set(
        Array.from({ length: 32 }, (_, i) => new Rng(i + 1, 'root').int(0, 1000))
      );
      expect(draws.size).toBeGreaterThan(20);
    });

    it('uses every bit of the seed', () => {
      const low = new Rng(7, 'root').next();
      expect(new Rng(2 ** 32 + 7, 'root').next()).not.toBe(low);
      expect(new Rng(2 ** 40 + 7, 'root').next()).not.toBe(low);
    });

    it('keeps float in [0, 1)', () => {
      const rng = new Rng(SEED, 'float');
      for (let i = 0; i < 1000; i++) {
        const value = rng.float();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('draws integers inside inclusive bounds', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: -1_000_000, max: 1_000_000 }),
          fc.integer({ min: 0, max: 1000 }),
          fc.string(),
          (min, width, label) => {
            const value = new Rng(SEED, label).int(min, min + width);
            return Number.isInteger(value) && value >= min && value <= min + width;
          }
        ),
        { seed: SEED }
      );
    });

    it('returns min for an empty or inverted range', () => {
      const rng = new Rng(SEED, 'range');
      expect(rng.int(5, 5)).toBe(5);
      expect(rng.int(9, 3)).toBe(9);
    });

    it('handles spans wider than 32 bits', () => {
      const rng = new Rng(SEED, 'wide');
      for (let i = 0; i < 100; i++) {
        const value = rng.int(-Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);
        expect(Number.isSafeInteger(value)).toBe(true);
      }
    });

    it('draws bigints inside bounds', () => {
      const rng = new Rng(SEED, 'bigint');
      for (let i = 0; i < 100; i++) {
        const value = rng.bigint(-(2n ** 70n), 2n ** 70n);
        expect(value >= -(2n ** 70n) && value <= 2n ** 70n).toBe(true);
      }
    });

    it('shuffles into a permutation', () => {
      const items = [1, 2, 3, 4, 5, 6];
      const shuffled = new Rng(SEED, 'shuffle').shuffle(items);
      expect([...shuffled].sort()).toEqual(items);
      expect(items).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('refuses to pick from an empty list', () => {
      expect(() => new Rng(SEED, 'pick').pick([])).toThrow(RangeError);
    });

    it('forks independently of how far the parent advanced', () => {
      const fresh = new Rng(SEED, 'root');
      const advanced = new Rng(SEED, 'root');
      advanced.next();
      advanced.next();
      expect(fresh.fork('child').next()).toBe(advanced.fork('child').next());
      expect(fresh.fork('child').label).toBe('root/child');
    });
  });
});
