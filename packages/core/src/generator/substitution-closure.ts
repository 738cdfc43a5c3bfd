import { SubstitutionOverflowError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { OrderedSet } from '../util/ordered-set.js';

/** Lowercase single character to its ordered replacement strings. */
export type TransformationTable = Readonly<Record<string, readonly string[]>>;

export interface ClosureLimits {
  /** Rounds that may still add new strings before the search gives up. */
  maxRounds: number;
  /** Upper bound on the closure size, the original word included. */
  maxVariants: number;
}

export const DEFAULT_CLOSURE_LIMITS: Readonly<ClosureLimits> = Object.freeze({
  maxRounds: 64,
  maxVariants: 100_000,
});

function replacementsFor(
  table: TransformationTable,
  char: string
): readonly string[] {
  const key = char.toLowerCase();
  return Object.hasOwn(table, key) ? (table[key] ?? []) : [];
}

function* singleSubstitutions(
  word: string,
  table: TransformationTable
): Generator<string> {
  for (let i = 0; i < word.length; i++) {
    for (const sub of replacementsFor(table, word.charAt(i))) {
      yield word.slice(0, i) + sub + word.slice(i + 1);
    }
  }
}

/**
 * Every string reachable from `word` by replacing exactly one character.
 * The word itself comes first; the rest follow position by position, in
 * table order for each position.
 */
export function oneStep(
  word: string,
  table: TransformationTable
): OrderedSet<string> {
  const variants = new OrderedSet<string>([word]);
  variants.addAll(singleSubstitutions(word, table));
  return variants;
}

/**
 * Fixed point of repeated single substitutions, found breadth-first.
 *
 * Each round rescans the strings discovered in the previous one, so
 * characters introduced by a replacement are substitutable in turn. The
 * result lists the original word, then round-one strings, then round-two
 * strings, and so on.
 *
 * Precondition: the table must not let strings grow without bound (e.g.
 * `a -> aa`). The limits turn such tables into a SubstitutionOverflowError
 * instead of an endless loop.
 */
export function closure(
  word: string,
  table: TransformationTable,
  limits: Partial<ClosureLimits> = {}
): Result<OrderedSet<string>, SubstitutionOverflowError> {
  const maxRounds = limits.maxRounds ?? DEFAULT_CLOSURE_LIMITS.maxRounds;
  const maxVariants = limits.maxVariants ?? DEFAULT_CLOSURE_LIMITS.maxVariants;
  const seen = new OrderedSet<string>([word]);
  let frontier: string[] = [word];
  let rounds = 0;

  while (frontier.length > 0) {
    const next: string[] = [];
    for (const current of frontier) {
      for (const variant of singleSubstitutions(current, table)) {
        if (!seen.add(variant)) continue;
        if (seen.size > maxVariants) {
          return err(
            new SubstitutionOverflowError({
              word,
              limit: 'variants',
              bound: maxVariants,
              reached: seen.size,
            })
          );
        }
        next.push(variant);
      }
    }
    if (next.length > 0) {
      rounds += 1;
      if (rounds > maxRounds) {
        return err(
          new SubstitutionOverflowError({
            word,
            limit: 'rounds',
            bound: maxRounds,
            reached: rounds,
          })
        );
      }
    }
    frontier = next;
  }

  return ok(seen);
}
