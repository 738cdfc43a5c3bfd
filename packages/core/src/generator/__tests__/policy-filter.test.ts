import { describe, it, expect } from 'vitest';

import { parsePolicyRequirements, satisfies } from '../policy-filter';
import { ErrorCode } from '../../errors/codes';

describe('satisfies', () => {
  it('is vacuously true for an empty requirement set', () => {
    expect(satisfies('abc', [])).toBe(true);
  });

  it('checks for an uppercase Latin letter', () => {
    expect(satisfies('abc', ['requires-uppercase'])).toBe(false);
    expect(satisfies('aBc', ['requires-uppercase'])).toBe(true);
  });

  it('checks for a decimal digit', () => {
    expect(satisfies('abc', ['requires-digit'])).toBe(false);
    expect(satisfies('abc7', ['requires-digit'])).toBe(true);
  });

  it('counts anything but letters and digits as special', () => {
    expect(satisfies('Abc123', ['requires-special'])).toBe(false);
    expect(satisfies('Abc 123', ['requires-special'])).toBe(true);
    expect(satisfies('Abc_123', ['requires-special'])).toBe(true);
  });

  it('ANDs every requirement', () => {
    const all = ['requires-uppercase', 'requires-digit', 'requires-special'];
    expect(satisfies('Summer2024!', all)).toBe(true);
    expect(satisfies('Summer2024', all)).toBe(false);
    expect(satisfies('summer2024!', all)).toBe(false);
  });

  it('ignores unknown requirement names', () => {
    expect(satisfies('abc', ['requires-emoji'])).toBe(true);
    expect(satisfies('abc', ['requires-emoji', 'requires-digit'])).toBe(false);
  });
});

describe('parsePolicyRequirements', () => {
  it('maps config names to requirements', () => {
    const parsed = parsePolicyRequirements(['uppercase', 'number', 'special']);
    expect(parsed.requirements).toEqual([
      'requires-uppercase',
      'requires-digit',
      'requires-special',
    ]);
    expect(parsed.warnings).toEqual([]);
  });

  it('treats digit as an alias of number', () => {
    const parsed = parsePolicyRequirements(['digit', 'number']);
    expect(parsed.requirements).toEqual(['requires-digit']);
  });

  it('warns about unknown names without failing', () => {
    const parsed = parsePolicyRequirements(['uppercase', 'length']);
    expect(parsed.requirements).toEqual(['requires-uppercase']);
    expect(parsed.warnings).toHaveLength(1);
    expect(parsed.warnings[0]?.errorCode).toBe(
      ErrorCode.INVALID_POLICY_REQUIREMENT
    );
    expect(parsed.warnings[0]?.message).toBe(
      'Ignoring unknown policy requirement "length"'
    );
  });
});
