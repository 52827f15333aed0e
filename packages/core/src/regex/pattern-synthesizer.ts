/* eslint-disable complexity */
/**
 * Pattern synthesis
 * Parses an ECMAScript pattern into a small AST and samples strings from it.
 * Every candidate is checked against the compiled RegExp before it is
 * returned, so unsupported zero-width constructs (lookarounds, word
 * boundaries) only cost retries, never wrong output.
 */

import { err, ok, type Result } from '../types/result.js';
import type { Rng } from '../util/rng.js';

type CharRange = readonly [number, number];

export type PatternNode =
  | { kind: 'empty' }
  | { kind: 'chars'; ranges: readonly CharRange[] }
  | { kind: 'sequence'; items: readonly PatternNode[] }
  | { kind: 'alternation'; branches: readonly PatternNode[] }
  | {
      kind: 'repeat';
      node: PatternNode;
      min: number;
      max: number | undefined;
    }
  | { kind: 'group'; node: PatternNode; index: number | undefined }
  | { kind: 'backref'; index: number };

export type SynthesisFailure =
  | { reason: 'syntax'; message: string }
  | { reason: 'length'; message: string }
  | { reason: 'no-match'; message: string };

export interface SynthesisOptions {
  minLength?: number;
  maxLength?: number;
}

const PRINTABLE: CharRange = [0x20, 0x7e];
const DIGIT: readonly CharRange[] = [[0x30, 0x39]];
const WORD: readonly CharRange[] = [
  [0x30, 0x39],
  [0x41, 0x5a],
  [0x5f, 0x5f],
  [0x61, 0x7a],
];
// generation only ever emits a plain space for \s
const SPACE: readonly CharRange[] = [[0x20, 0x20]];
const ANY: readonly CharRange[] = [PRINTABLE];
const EMPTY: PatternNode = { kind: 'empty' };

// budget of extra repetitions for unbounded quantifiers, tried in order
const REPEAT_BUDGETS = [6, 3, 1, 0, 12, 24, 48] as const;
const ATTEMPTS_PER_BUDGET = 8;

class PatternSyntaxError extends Error {}

function single(code: number): PatternNode {
  return { kind: 'chars', ranges: [[code, code]] };
}

function normalize(ranges: readonly CharRange[]): CharRange[] {
  const sorted = [...ranges].sort((a, b) => a[0] - b[0]);
  const out: [number, number][] = [];
  for (const [lo, hi] of sorted) {
    const last = out[out.length - 1];
    if (last && lo <= last[1] + 1) {
      last[1] = Math.max(last[1], hi);
    } else {
      out.push([lo, hi]);
    }
  }
  return out;
}

/** Complement within printable ASCII. */
function complement(ranges: readonly CharRange[]): CharRange[] {
  const out: CharRange[] = [];
  let next = PRINTABLE[0];
  for (const [lo, hi] of normalize(ranges)) {
    if (hi < PRINTABLE[0] || lo > PRINTABLE[1]) continue;
    if (lo > next) out.push([next, lo - 1]);
    next = Math.max(next, hi + 1);
  }
  if (next <= PRINTABLE[1]) out.push([next, PRINTABLE[1]]);
  return out;
}

class PatternParser {
  private pos = 0;
  private groups = 0;

  constructor(private readonly src: string) {}

  parse(): PatternNode {
    const node = this.alternation();
    if (this.pos < this.src.length) {
      throw new PatternSyntaxError(`Unmatched ')' at position ${this.pos}`);
    }
    return node;
  }

  private peek(offset = 0): string | undefined {
    return this.src[this.pos + offset];
  }

  private alternation(): PatternNode {
    const branches = [this.sequence()];
    while (this.peek() === '|') {
      this.pos++;
      branches.push(this.sequence());
    }
    return branches.length === 1 ? branches[0] : { kind: 'alternation', branches };
  }

  private sequence(): PatternNode {
    const items: PatternNode[] = [];
    for (let c = this.peek(); c !== undefined && c !== '|' && c !== ')'; c = this.peek()) {
      items.push(this.quantified(this.atom()));
    }
    if (items.length === 0) return EMPTY;
    return items.length === 1 ? items[0] : { kind: 'sequence', items };
  }

  private quantified(node: PatternNode): PatternNode {
    const c = this.peek();
    let min: number;
    let max: number | undefined;
    if (c === '*') {
      [min, max] = [0, undefined];
      this.pos++;
    } else if (c === '+') {
      [min, max] = [1, undefined];
      this.pos++;
    } else if (c === '?') {
      [min, max] = [0, 1];
      this.pos++;
    } else if (c === '{') {
      const match = /^\{(\d+)(,(\d*))?\}/.exec(this.src.slice(this.pos));
      if (!match) return node;
      min = Number(match[1]);
      max = match[2] === undefined ? min : match[3] ? Number(match[3]) : undefined;
      if (max !== undefined && max < min) {
        throw new PatternSyntaxError('Quantifier range out of order');
      }
      this.pos += match[0].length;
    } else {
      return node;
    }
    if (this.peek() === '?') this.pos++; // lazy
    return { kind: 'repeat', node, min, max };
  }

  private atom(): PatternNode {
    const c = this.peek();
    this.pos++;
    switch (c) {
      case '^':
      case '$':
        return EMPTY;
      case '.':
        return { kind: 'chars', ranges: ANY };
      case '(':
        return this.group();
      case '[':
        return { kind: 'chars', ranges: this.charClass() };
      case '\\':
        return this.escape();
      case '*':
      case '+':
      case '?':
        throw new PatternSyntaxError(`Nothing to repeat at position ${this.pos - 1}`);
      default: {
        const code = this.src.codePointAt(this.pos - 1) ?? 0;
        if (code > 0xffff) this.pos++;
        return single(code);
      }
    }
  }

  private group(): PatternNode {
    let index: number | undefined;
    let zeroWidth = false;
    if (this.peek() === '?') {
      const rest = this.src.slice(this.pos, this.pos + 3);
      if (rest.startsWith('?:')) {
        this.pos += 2;
      } else if (rest.startsWith('?=') || rest.startsWith('?!')) {
        this.pos += 2;
        zeroWidth = true;
      } else if (rest === '?<=' || rest === '?<!') {
        this.pos += 3;
        zeroWidth = true;
      } else if (rest.startsWith('?<')) {
        const close = this.src.indexOf('>', this.pos);
        if (close < 0) throw new PatternSyntaxError('Unterminated group name');
        this.pos = close + 1;
        index = ++this.groups;
      } else {
        throw new PatternSyntaxError('Invalid group');
      }
    } else {
      index = ++this.groups;
    }
    const node = this.alternation();
    if (this.peek() !== ')') throw new PatternSyntaxError('Unterminated group');
    this.pos++;
    return zeroWidth ? EMPTY : { kind: 'group', node, index };
  }

  private charClass(): CharRange[] {
    let negated = false;
    if (this.peek() === '^') {
      negated = true;
      this.pos++;
    }
    const ranges: CharRange[] = [];
    while (this.peek() !== ']') {
      if (this.peek() === undefined) {
        throw new PatternSyntaxError('Unterminated character class');
      }
      const lo = this.classAtom();
      if (this.peek() === '-' && this.peek(1) !== ']' && this.peek(1) !== undefined && lo.length === 1 && lo[0][0] === lo[0][1]) {
        this.pos++;
        const hi = this.classAtom();
        if (hi.length !== 1 || hi[0][0] !== hi[0][1]) {
          ranges.push(...lo, [0x2d, 0x2d], ...hi);
          continue;
        }
        if (hi[0][0] < lo[0][0]) {
          throw new PatternSyntaxError('Range out of order in character class');
        }
        ranges.push([lo[0][0], hi[0][0]]);
      } else {
        ranges.push(...lo);
      }
    }
    this.pos++;
    const set = negated ? complement(ranges) : normalize(ranges);
    if (set.length === 0) {
      throw new PatternSyntaxError('Character class matches nothing printable');
    }
    return set;
  }

  private classAtom(): readonly CharRange[] {
    const c = this.peek();
    this.pos++;
    if (c === '\\') {
      const node = this.escape(true);
      return node.kind === 'chars' ? node.ranges : [];
    }
    const code = this.src.codePointAt(this.pos - 1) ?? 0;
    if (code > 0xffff) this.pos++;
    return [[code, code]];
  }

  private escape(inClass = false): PatternNode {
    const c = this.peek();
    this.pos++;
    switch (c) {
      case undefined:
        throw new PatternSyntaxError('Trailing backslash');
      case 'd':
        return { kind: 'chars', ranges: DIGIT };
      case 'D':
        return { kind: 'chars', ranges: complement(DIGIT) };
      case 'w':
        return { kind: 'chars', ranges: WORD };
      case 'W':
        return { kind: 'chars', ranges: complement(WORD) };
      case 's':
        return { kind: 'chars', ranges: SPACE };
      case 'S':
        return { kind: 'chars', ranges: [[0x21, 0x7e]] };
      case 'b':
        return inClass ? single(0x08) : EMPTY;
      case 'B':
        return EMPTY;
      case 'n':
        return single(0x0a);
      case 't':
        return single(0x09);
      case 'r':
        return single(0x0d);
      case 'f':
        return single(0x0c);
      case 'v':
        return single(0x0b);
      case '0':
        return single(0);
      case 'x':
        return single(this.hex(2, c));
      case 'u':
        // without the u flag, \u{n} is a literal u under a quantifier
        return single(this.hex(4, c));
      case 'c': {
        const letter = this.peek();
        this.pos++;
        return single((letter?.charCodeAt(0) ?? 0) % 32);
      }
      case 'k':
        throw new PatternSyntaxError('Named back-references are not supported');
      default:
        if (!inClass && c >= '1' && c <= '9') {
          let digits = c;
          for (let d = this.peek(); d !== undefined && d >= '0' && d <= '9'; d = this.peek()) {
            digits += d;
            this.pos++;
          }
          return { kind: 'backref', index: Number(digits) };
        }
        return single(c.codePointAt(0) ?? 0);
    }
  }

  private hex(length: number, letter: string): number {
    const text = this.src.slice(this.pos, this.pos + length);
    if (!/^[0-9a-fA-F]+$/.test(text) || text.length !== length) {
      return letter.charCodeAt(0);
    }
    this.pos += length;
    return parseInt(text, 16);
  }
}

export function parsePattern(source: string): Result<PatternNode, string> {
  try {
    return ok(new PatternParser(source).parse());
  } catch (error) {
    if (error instanceof PatternSyntaxError) return err(error.message);
    throw error;
  }
}

function sample(
  node: PatternNode,
  rng: Rng,
  budget: number,
  captures: Map<number, string>
): string {
  switch (node.kind) {
    case 'empty':
      return '';
    case 'chars': {
      const total = node.ranges.reduce((sum, [lo, hi]) => sum + hi - lo + 1, 0);
      let index = rng.int(0, total - 1);
      for (const [lo, hi] of node.ranges) {
        const size = hi - lo + 1;
        if (index < size) return String.fromCodePoint(lo + index);
        index -= size;
      }
      return '';
    }
    case 'sequence':
      return node.items.map((item) => sample(item, rng, budget, captures)).join('');
    case 'alternation':
      return sample(rng.pick(node.branches), rng, budget, captures);
    case 'repeat': {
      const upper = node.max === undefined ? node.min + budget : Math.min(node.max, node.min + budget);
      const count = rng.int(node.min, upper);
      let out = '';
      for (let i = 0; i < count; i++) out += sample(node.node, rng, budget, captures);
      return out;
    }
    case 'group': {
      const text = sample(node.node, rng, budget, captures);
      if (node.index !== undefined) captures.set(node.index, text);
      return text;
    }
    case 'backref':
      return captures.get(node.index) ?? '';
  }
}

function lengthOf(value: string): number {
  return Array.from(value).length;
}

/**
 * Produce a string matching `pattern` within the optional length bounds.
 * Smaller repetition budgets are tried first so bounded output stays short.
 */
export function synthesizePattern(
  pattern: string,
  rng: Rng,
  options: SynthesisOptions = {}
): Result<string, SynthesisFailure> {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error) {
    return err({
      reason: 'syntax',
      message: error instanceof Error ? error.message : String(error),
    });
  }
  const parsed = parsePattern(pattern);
  if (parsed.isErr()) {
    return err({ reason: 'syntax', message: parsed.error });
  }

  const { minLength = 0, maxLength = Number.POSITIVE_INFINITY } = options;
  let matchedOutsideBounds = false;
  for (const budget of REPEAT_BUDGETS) {
    for (let attempt = 0; attempt < ATTEMPTS_PER_BUDGET; attempt++) {
      const candidate = sample(
        parsed.value,
        rng.fork(`pattern:${budget}:${attempt}`),
        budget,
        new Map()
      );
      if (!regex.test(candidate)) continue;
      const length = lengthOf(candidate);
      if (length >= minLength && length <= maxLength) return ok(candidate);
      matchedOutsideBounds = true;
    }
  }
  return matchedOutsideBounds
    ? err({
        reason: 'length',
        message: `no match for ${pattern} between ${minLength} and ${maxLength} characters`,
      })
    : err({ reason: 'no-match', message: `could not synthesize a match for ${pattern}` });
}
