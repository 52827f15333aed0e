import { describe, it, expect } from 'vitest';
import { collect, err, isErr, isOk, ok, type Result } from '../result.js';

describe('Result', () => {
  it('narrows with isOk and isErr', () => {
    const good: Result<number, string> = ok(1);
    const bad: Result<number, string> = err('nope');
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    if (bad.isErr()) expect(bad.error).toBe('nope');
  });

  it('maps values and errors on the matching side only', () => {
    expect(ok(2).map((n) => n * 3).value).toBe(6);
    expect(err('x').mapErr((e) => `${e}!`).error).toBe('x!');
    expect(ok(2).mapErr().value).toBe(2);
    expect(err('x').map().error).toBe('x');
  });

  it('chains with flatMap', () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`);
    expect(ok(8).flatMap(half).unwrap()).toBe(4);
    const failed = ok(3).flatMap(half);
    expect(failed.isErr() && failed.error).toBe('3 is odd');
    expect(err('early').flatMap().error).toBe('early');
  });

  it('throws Error payloads as they are from unwrap', () => {
    const error = new RangeError('bad');
    expect(() => err(error).unwrap()).toThrow(error);
    expect(() => err('plain').unwrap()).toThrow('Called unwrap on an Err value: plain');
    expect(err('plain').unwrapOr(5)).toBe(5);
  });

  it('collects until the first failure', () => {
    expect(collect([ok(1), ok(2)]).unwrap()).toEqual([1, 2]);
    const results: Result<number, string>[] = [ok(1), err('first'), err('second')];
    const collected = collect(results);
    expect(collected.isErr() && collected.error).toBe('first');
  });
});
