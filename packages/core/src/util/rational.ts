// Exact rational helpers used for multipleOf generation

export type Rat = { p: bigint; q: bigint };

export function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

export function reduce(p: bigint, q: bigint): Rat {
  if (q === 0n) throw new RangeError('Denominator must be non-zero');
  if (q < 0n) {
    p = -p;
    q = -q;
  }
  const g = gcd(p, q);
  return g === 0n ? { p: 0n, q: 1n } : { p: p / g, q: q / g };
}

/** floor(a / b) for b > 0 */
export function floorDiv(a: bigint, b: bigint): bigint {
  const d = a / b;
  return a % b !== 0n && a < 0n ? d - 1n : d;
}

/** ceil(a / b) for b > 0 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  const d = a / b;
  return a % b !== 0n && a > 0n ? d + 1n : d;
}

const DECIMAL_RE = /^(-)?(\d+)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

/**
 * Exact rational value of a finite number, taken from its shortest decimal
 * text (so 0.1 is 1/10, not the nearest binary fraction).
 */
export function ratFromNumber(value: number): Rat {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot convert ${value} to a rational`);
  }
  const match = DECIMAL_RE.exec(String(value));
  if (!match) {
    throw new RangeError(`Unrecognized numeric text: ${String(value)}`);
  }
  const [, sign, whole = '0', fraction = '', exponent = '0'] = match;
  let p = BigInt(whole + fraction);
  let q = 10n ** BigInt(fraction.length);
  const exp = Number(exponent);
  if (exp > 0) p *= 10n ** BigInt(exp);
  if (exp < 0) q *= 10n ** BigInt(-exp);
  return reduce(sign ? -p : p, q);
}

/** Count of decimal places needed to write the reduced rational exactly, or undefined if none suffice. */
export function decimalPlaces(r: Rat): number | undefined {
  let q = r.q;
  let twos = 0;
  let fives = 0;
  while (q % 2n === 0n) {
    q /= 2n;
    twos++;
  }
  while (q % 5n === 0n) {
    q /= 5n;
    fives++;
  }
  return q === 1n ? Math.max(twos, fives) : undefined;
}

/**
 * Convert k * step into a JS number. For terminating decimals the value goes
 * through its exact decimal text, so the result prints with no more places
 * than the step itself.
 */
export function ratToNumber(r: Rat): number {
  const places = decimalPlaces(r);
  if (places === undefined) {
    return Number(r.p) / Number(r.q);
  }
  const scaled = r.p * (10n ** BigInt(places) / r.q);
  const negative = scaled < 0n;
  const digits = (negative ? -scaled : scaled)
    .toString()
    .padStart(places + 1, '0');
  const head = digits.slice(0, digits.length - places);
  const tail = digits.slice(digits.length - places);
  const text = places > 0 ? `${head}.${tail}` : head;
  return Number(negative ? `-${text}` : text);
}
