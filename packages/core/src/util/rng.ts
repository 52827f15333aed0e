// Deterministic randomness for generation. Every value is a pure function of
// (seed, label); nothing reads Math.random or shared mutable state.

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/** murmur3 fmix32 finalizer; spreads every input bit across the word. */
export function mix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b) >>> 0;
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35) >>> 0;
  h ^= h >>> 16;
  return h >>> 0;
}

// xorshift32 never leaves the all-zero state, so it must never start there
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = mix32(fnv1a32(`${seed}:${label}`)), 0 replaced by a fixed constant
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class Rng {
  private x: number;

  constructor(
    readonly seed: number,
    readonly label: string
  ) {
    const initial = mix32(fnv1a32(`${seed}:${label}`));
    this.x = initial === 0 ? ZERO_STATE_REPLACEMENT : initial;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  float(): number {
    return this.next() / 0x100000000;
  }

  /** Uniform integer in [min, max], both inclusive and safe integers. */
  int(min: number, max: number): number {
    if (max <= min) return min;
    const span = max - min + 1;
    if (span <= 0x100000000) {
      return min + Math.floor(this.float() * span);
    }
    return Number(this.bigint(BigInt(min), BigInt(max)));
  }

  /** Uniform bigint in [min, max], both inclusive. */
  bigint(min: bigint, max: bigint): bigint {
    if (max <= min) return min;
    const span = max - min + 1n;
    let bits = 0;
    for (let s = span - 1n; s > 0n; s >>= 1n) bits++;
    const words = Math.ceil(bits / 32);
    const mask = (1n << BigInt(bits)) - 1n;
    // rejection sampling keeps the draw uniform; expected attempts < 2
    for (;;) {
      let candidate = 0n;
      for (let i = 0; i < words; i++) {
        candidate = (candidate << 32n) | BigInt(this.next());
      }
      candidate &= mask;
      if (candidate < span) return min + candidate;
    }
  }

  bool(probability = 0.5): boolean {
    return this.float() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }

  /**
   * Derive an independent stream for a child location. Depends only on this
   * stream's seed, label and the child label, not on how far it has advanced.
   */
  fork(label: string): Rng {
    return new Rng(this.seed, `${this.label}/${label}`);
  }
}
