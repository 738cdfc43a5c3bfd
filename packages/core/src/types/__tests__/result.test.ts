import { describe, it, expect } from 'vitest';
/**
 * Tests for Result<T, E> pattern
 */

import {
  type Result,
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  collect,
} from '../result';

describe('Result Pattern', () => {
  describe('Ok class', () => {
    it('should create Ok instance with value', () => {
      const result = new Ok(42);

      expect(result.value).toBe(42);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
    });

    it('should map over success value', () => {
      expect(new Ok(10).map((x) => x * 2).value).toBe(20);
    });

    it('should not affect mapErr for Ok', () => {
      const mapped = new Ok('success').mapErr((_err: never) => 'error');
      expect(mapped.value).toBe('success');
    });

    it('should flatMap to another result', () => {
      const flatMapped = new Ok(5).flatMap((x) => ok(x * 3));
      expect(flatMapped.isOk() && flatMapped.value).toBe(15);
    });

    it('should unwrap and ignore the default', () => {
      expect(new Ok('v').unwrap()).toBe('v');
      expect(new Ok('v').unwrapOr('d')).toBe('v');
    });
  });

  describe('Err class', () => {
    it('should create Err instance with error', () => {
      const result = new Err('bad');

      expect(result.error).toBe('bad');
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
    });

    it('should pass through map and flatMap', () => {
      const result = new Err('bad');
      expect(result.map((x: never) => x).error).toBe('bad');
      expect(result.flatMap((x: never) => ok(x)).error).toBe('bad');
    });

    it('should transform the error with mapErr', () => {
      expect(new Err('bad').mapErr((e) => e.toUpperCase()).error).toBe('BAD');
    });

    it('should rethrow Error values on unwrap', () => {
      const error = new RangeError('out of range');
      expect(() => new Err(error).unwrap()).toThrow(error);
    });

    it('should wrap non-Error values on unwrap', () => {
      expect(() => new Err('bad').unwrap()).toThrow(
        'Called unwrap on an Err value: bad'
      );
    });

    it('should return the default from unwrapOr', () => {
      expect(new Err('bad').unwrapOr(7)).toBe(7);
    });
  });

  describe('helpers', () => {
    it('isOk and isErr narrow a union', () => {
      const good: Result<number, string> = ok(1);
      const bad: Result<number, string> = err('no');
      expect(isOk(good)).toBe(true);
      expect(isErr(good)).toBe(false);
      expect(isOk(bad)).toBe(false);
      expect(isErr(bad)).toBe(true);
    });

    it('collect gathers values in order', () => {
      const result = collect([ok(1), ok(2), ok(3)]);
      expect(result.unwrap()).toEqual([1, 2, 3]);
    });

    it('collect stops at the first Err', () => {
      const seen: number[] = [];
      function* results(): Generator<Result<number, string>> {
        for (const n of [1, 2, 3]) {
          seen.push(n);
          yield n === 2 ? err(`failed at ${n}`) : ok(n);
        }
      }
      const result = collect(results());
      expect(isErr(result) && result.error).toBe('failed at 2');
      expect(seen).toEqual([1, 2]);
    });

    it('collect of nothing is an empty Ok', () => {
      expect(collect([]).unwrap()).toEqual([]);
    });
  });
});
