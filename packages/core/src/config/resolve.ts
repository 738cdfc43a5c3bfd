import { parseCaseForms } from '../generator/case-variants.js';
import {
  SEPARATORS_SLOT,
  WORD_SLOT,
  type PlaceholderPools,
} from '../generator/pattern-expander.js';
import { parsePolicyRequirements } from '../generator/policy-filter.js';
import type { TransformationTable } from '../generator/substitution-closure.js';
import type { PipelineInput, PipelineOptions } from '../pipeline/types.js';
import { ConfigError, type PassmithError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { PassmithConfig } from './schema.js';

export const DEFAULT_YEARS = 2;

export const BUILTIN_SLOTS = [
  WORD_SLOT,
  'year',
  'season',
  'quarter',
  'special_chars',
  'num_seq',
  SEPARATORS_SLOT,
] as const;

export interface PoolOptions {
  /** Current year plus `years - 1` previous ones. */
  years?: number;
  now?: () => Date;
}

/**
 * Years as strings, newest first.
 */
export function yearPool(years: number, now: Date): string[] {
  const current = now.getFullYear();
  return Array.from({ length: years }, (_, i) => String(current - i));
}

/**
 * Build slot pools from the config. The word slot starts empty; the
 * pipeline fills it with each base word in turn.
 */
export function buildPlaceholderPools(
  config: PassmithConfig,
  options: PoolOptions = {}
): Result<PlaceholderPools, ConfigError> {
  const years = options.years ?? DEFAULT_YEARS;
  if (!Number.isInteger(years) || years < 1) {
    return err(
      new ConfigError({
        message: `Invalid years value "${String(years)}". Expected a positive integer.`,
        context: { setting: 'years', value: years },
      })
    );
  }
  const now = options.now?.() ?? new Date();

  const pools: Record<string, string[]> = {
    [WORD_SLOT]: [],
    year: yearPool(years, now),
    season: [...config.seasons],
    quarter: [...config.quarters],
    special_chars: [...config.decorations.special_chars],
    num_seq: [...config.decorations.num_seq],
    [SEPARATORS_SLOT]: [...config.separators],
  };

  const builtin = new Set<string>(BUILTIN_SLOTS);
  for (const [name, values] of Object.entries(config.placeholders ?? {})) {
    if (builtin.has(name)) {
      return err(
        new ConfigError({
          message: `Custom placeholder "${name}" shadows a built-in slot`,
          context: { setting: `placeholders.${name}` },
        })
      );
    }
    pools[name] = [...values];
  }

  return ok(pools);
}

/**
 * Lowercase the table keys, merging replacement lists for keys that only
 * differ in case. Replacement order is kept and repeats are dropped.
 */
export function normalizeTransformations(
  table: Readonly<Record<string, readonly string[]>>
): TransformationTable {
  const out: Record<string, string[]> = {};
  for (const [key, replacements] of Object.entries(table)) {
    const lower = key.toLowerCase();
    const merged = (out[lower] ??= []);
    for (const replacement of replacements) {
      if (!merged.includes(replacement)) merged.push(replacement);
    }
  }
  return out;
}

export interface ResolveInputOptions extends PoolOptions {
  baseWords: readonly string[];
  pipeline: PipelineOptions;
}

export interface ResolvedInput {
  input: PipelineInput;
  /** Non-fatal problems found in the config (unknown case forms or policies). */
  warnings: PassmithError[];
}

/**
 * Turn a validated config and the caller's options into pipeline input.
 */
export function resolvePipelineInput(
  config: PassmithConfig,
  options: ResolveInputOptions
): Result<ResolvedInput, ConfigError> {
  if (options.baseWords.length === 0) {
    return err(
      new ConfigError({
        message: 'No base words given. Use --words, --input or "base_words".',
        context: { setting: 'base_words' },
      })
    );
  }
  const { minLength, maxLength } = options.pipeline;
  for (const [setting, value] of [
    ['minlen', minLength],
    ['maxlen', maxLength],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      return err(
        new ConfigError({
          message: `Invalid ${setting} value "${String(value)}". Expected a non-negative integer.`,
          context: { setting, value },
        })
      );
    }
  }

  const pools = buildPlaceholderPools(config, options);
  if (pools.isErr()) return pools;

  const caseForms = parseCaseForms(config.case_variants);
  const policy = parsePolicyRequirements(config.policy_requirements);

  return ok({
    input: {
      baseWords: options.baseWords,
      templatesByGroup: config.patterns,
      pools: pools.value,
      caseForms: caseForms.forms,
      transformations: normalizeTransformations(config.transformations),
      policy: policy.requirements,
      options: options.pipeline,
    },
    warnings: [...caseForms.warnings, ...policy.warnings],
  });
}
