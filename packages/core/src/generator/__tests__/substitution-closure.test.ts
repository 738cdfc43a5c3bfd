import { describe, it, expect } from 'vitest';

import {
  closure,
  oneStep,
  type TransformationTable,
} from '../substitution-closure';
import { ErrorCode } from '../../errors/codes';
import { SubstitutionOverflowError } from '../../types/errors';

const table: TransformationTable = {
  a: ['4', '@'],
  e: ['3'],
  s: ['$', '5'],
};

describe('oneStep', () => {
  it('replaces one position at a time and keeps the original first', () => {
    expect(oneStep('cat', { a: ['4', '@'] }).toArray()).toEqual([
      'cat',
      'c4t',
      'c@t',
    ]);
  });

  it('walks positions left to right', () => {
    expect(oneStep('sea', table).toArray()).toEqual([
      'sea',
      '$ea',
      '5ea',
      's3a',
      'se4',
      'se@',
    ]);
  });

  it('matches uppercase characters through their lowercase key', () => {
    expect(oneStep('Ab', { a: ['4'] }).toArray()).toEqual(['Ab', '4b']);
  });

  it('supports multi-character replacements', () => {
    expect(oneStep('xo', { o: ['()'] }).toArray()).toEqual(['xo', 'x()']);
  });

  it('returns only the word when nothing is substitutable', () => {
    expect(oneStep('xyz', table).toArray()).toEqual(['xyz']);
  });
});

describe('closure', () => {
  it('equals the one-step set when replacements are terminal', () => {
    const result = closure('cat', { a: ['4', '@'] });
    expect(result.unwrap().toArray()).toEqual(['cat', 'c4t', 'c@t']);
  });

  it('combines substitutions across rounds in breadth-first order', () => {
    const result = closure('ae', { a: ['4'], e: ['3'] });
    expect(result.unwrap().toArray()).toEqual(['ae', '4e', 'a3', '43']);
  });

  it('counts every combination of per-position choices', () => {
    // s: 3 choices, e: 2 choices, a: 3 choices
    const result = closure('sea', table);
    expect(result.unwrap().size).toBe(3 * 2 * 3);
  });

  it('rescans characters introduced by earlier substitutions', () => {
    const result = closure('a', { a: ['e'], e: ['3'] });
    expect(result.unwrap().toArray()).toEqual(['a', 'e', '3']);
  });

  it('terminates on cyclic tables through the seen set', () => {
    const result = closure('a', { a: ['b'], b: ['a'] });
    expect(result.unwrap().toArray()).toEqual(['a', 'b']);
  });

  it('fails with a rounds overflow on unbounded growth', () => {
    const result = closure('a', { a: ['aa'] }, { maxRounds: 5 });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(SubstitutionOverflowError);
      expect(result.error.errorCode).toBe(ErrorCode.SUBSTITUTION_OVERFLOW);
      expect(result.error.limit).toBe('rounds');
      expect(result.error.bound).toBe(5);
    }
  });

  it('fails with a variants overflow when the set grows too large', () => {
    const result = closure('aaaa', { a: ['4', '@'] }, { maxVariants: 10 });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.limit).toBe('variants');
      expect(result.error.bound).toBe(10);
    }
  });

  it('accepts a closure that exactly reaches the variant cap', () => {
    const result = closure('cat', { a: ['4', '@'] }, { maxVariants: 3 });
    expect(result.unwrap().size).toBe(3);
  });

  it('is closed: the closure of any member stays inside the set', () => {
    const full = closure('sea', table).unwrap();
    for (const member of full) {
      for (const variant of closure(member, table).unwrap()) {
        expect(full.has(variant)).toBe(true);
      }
    }
  });
});
