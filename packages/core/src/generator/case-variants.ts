import { InvalidCaseFormError } from '../types/errors.js';
import { OrderedSet } from '../util/ordered-set.js';

export type CaseForm = 'lowercase' | 'uppercase' | 'titlecase';

export const CASE_FORMS: readonly CaseForm[] = [
  'lowercase',
  'uppercase',
  'titlecase',
];

// Config tokens accepted for each form
const CASE_FORM_TOKENS: Readonly<Record<string, CaseForm>> = {
  '{word_lc}': 'lowercase',
  '{word_uc}': 'uppercase',
  '{word_tc}': 'titlecase',
  lowercase: 'lowercase',
  uppercase: 'uppercase',
  titlecase: 'titlecase',
};

const RUN_RE = /[A-Za-z0-9]+|[^A-Za-z0-9]+/g;
const ALNUM_RE = /^[A-Za-z0-9]/;

/**
 * Capitalize the first character of every alphanumeric run and lowercase
 * the rest of it. Runs of other characters are kept as they are.
 *
 * @example toTitleCase('acme-corp2024') === 'Acme-Corp2024'
 */
export function toTitleCase(value: string): string {
  let out = '';
  for (const [run] of value.matchAll(RUN_RE)) {
    out += ALNUM_RE.test(run)
      ? run.charAt(0).toUpperCase() + run.slice(1).toLowerCase()
      : run;
  }
  return out;
}

export function applyCaseForm(value: string, form: CaseForm): string {
  switch (form) {
    case 'lowercase':
      return value.toLowerCase();
    case 'uppercase':
      return value.toUpperCase();
    case 'titlecase':
      return toTitleCase(value);
  }
}

/**
 * Requested case forms of `password`, in the order the forms are given.
 * Forms that coincide (e.g. an all-digit string) appear once.
 */
export function applyCaseForms(
  password: string,
  forms: readonly CaseForm[]
): OrderedSet<string> {
  const variants = new OrderedSet<string>();
  for (const form of forms) {
    variants.add(applyCaseForm(password, form));
  }
  return variants;
}

export interface ParsedCaseForms {
  forms: CaseForm[];
  warnings: InvalidCaseFormError[];
}

/**
 * Map config tokens to case forms. Unknown tokens are dropped and reported.
 */
export function parseCaseForms(tokens: readonly string[]): ParsedCaseForms {
  const forms = new OrderedSet<CaseForm>();
  const warnings: InvalidCaseFormError[] = [];
  for (const token of tokens) {
    const form = Object.hasOwn(CASE_FORM_TOKENS, token)
      ? CASE_FORM_TOKENS[token]
      : undefined;
    if (form) {
      forms.add(form);
    } else {
      warnings.push(new InvalidCaseFormError(token));
    }
  }
  return { forms: forms.toArray(), warnings };
}
