import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import {
  applyCaseForm,
  CASE_FORMS,
} from '../../src/generator/case-variants.js';
import { expandPattern } from '../../src/generator/pattern-expander.js';
import { closure } from '../../src/generator/substitution-closure.js';
import { generateCandidates } from '../../src/pipeline/orchestrator.js';
import { dedupeOrdered } from '../../src/util/ordered-set.js';

const SEED = 424_242;

const token = fc
  .array(fc.constantFrom('a', 'e', 'o', 's', 'x', '1', '-'), {
    minLength: 1,
    maxLength: 4,
  })
  .map((chars) => chars.join(''));

const pool = fc.array(token, { minLength: 1, maxLength: 3 });

const LEET_TABLE = { a: ['4', '@'], e: ['3'], o: ['0'], s: ['$'] };

describe('generation properties', () => {
  it('expands to the product of the pool sizes', () => {
    const property = fc.property(
      fc.array(pool, { minLength: 1, maxLength: 3 }),
      (pools) => {
        const named = Object.fromEntries(pools.map((p, i) => [`p${i}`, p]));
        const template = pools.map((_, i) => `{p${i}}`).join('+');
        const expected = pools.reduce((n, p) => n * p.length, 1);
        expect(expandPattern(template, named).unwrap()).toHaveLength(expected);
      }
    );
    fc.assert(property, { seed: SEED, numRuns: 50 });
  });

  it('multiplies by |separators|^k independently and |separators| when shared', () => {
    const property = fc.property(
      pool,
      pool,
      fc.integer({ min: 1, max: 3 }),
      (words, separators, k) => {
        const template =
          '{w}' + Array.from({ length: k }, () => '{separators}x').join('');
        const pools = { w: words, separators };
        expect(expandPattern(template, pools).unwrap()).toHaveLength(
          words.length * separators.length ** k
        );
        expect(
          expandPattern(template, pools, { separatorMode: 'shared' }).unwrap()
        ).toHaveLength(words.length * separators.length);
      }
    );
    fc.assert(property, { seed: SEED, numRuns: 50 });
  });

  it('closure is closed under itself and starts with the input', () => {
    const property = fc.property(token, (word) => {
      const full = closure(word, LEET_TABLE).unwrap();
      expect(full.toArray()[0]).toBe(word);
      for (const member of full) {
        for (const variant of closure(member, LEET_TABLE).unwrap()) {
          expect(full.has(variant)).toBe(true);
        }
      }
    });
    fc.assert(property, { seed: SEED, numRuns: 50 });
  });

  it('case forms are idempotent', () => {
    const property = fc.property(
      fc.string({ maxLength: 12 }),
      fc.constantFrom(...CASE_FORMS),
      (value, form) => {
        const once = applyCaseForm(value, form);
        expect(applyCaseForm(once, form)).toBe(once);
      }
    );
    fc.assert(property, { seed: SEED, numRuns: 200 });
  });

  it('ordered dedupe keeps first occurrences in order', () => {
    const property = fc.property(fc.array(token, { maxLength: 20 }), (values) => {
      const deduped = dedupeOrdered(values);
      expect(new Set(deduped).size).toBe(deduped.length);
      const firstIndexes = deduped.map((v) => values.indexOf(v));
      expect(firstIndexes).toEqual([...firstIndexes].sort((a, b) => a - b));
      expect(new Set(deduped)).toEqual(new Set(values));
    });
    fc.assert(property, { seed: SEED, numRuns: 100 });
  });

  it('pipeline output is unique and inside the length bounds', () => {
    const property = fc.property(
      fc.array(token, { minLength: 1, maxLength: 3 }),
      pool,
      fc.integer({ min: 0, max: 6 }),
      fc.integer({ min: 0, max: 10 }),
      fc.boolean(),
      (baseWords, separators, minLength, maxLength, applyLeet) => {
        const result = generateCandidates({
          baseWords,
          templatesByGroup: { g: ['{custom_word}{separators}{num_seq}'] },
          pools: { separators, num_seq: ['1', '12'] },
          caseForms: ['lowercase', 'titlecase'],
          transformations: LEET_TABLE,
          policy: [],
          options: { applyLeet, minLength, maxLength, enforcePolicy: false },
        }).unwrap();

        expect(new Set(result.candidates).size).toBe(result.candidates.length);
        expect(result.count).toBe(result.candidates.length);
        for (const candidate of result.candidates) {
          expect(candidate.length).toBeGreaterThanOrEqual(minLength);
          if (maxLength > 0) {
            expect(candidate.length).toBeLessThanOrEqual(maxLength);
          }
        }
      }
    );
    fc.assert(property, { seed: SEED, numRuns: 50 });
  });
});
