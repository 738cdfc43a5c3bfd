import {
  ConfigError,
  DEFAULT_YEARS,
  type SeparatorMode,
} from '@passmith/core';

export type OutputFormat = 'text' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  words?: string;
  input?: string;
  config?: string;
  output?: string;
  minlen?: string | number;
  maxlen?: string | number;
  years?: string | number;
  leet?: boolean;
  enforcePolicy?: boolean;
  separatorMode?: string;
  maxLeetRounds?: string | number;
  maxLeetVariants?: string | number;
  out?: string;
  quiet?: boolean;
  printMetrics?: boolean;
  // Commander sets metrics=false when --no-metrics is used
  metrics?: boolean;
  debugPasses?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

function invalidFlag(flag: string, value: unknown, expected: string): ConfigError {
  return new ConfigError({
    message: `Invalid --${flag} value "${String(value)}". Expected ${expected}.`,
    context: { setting: `--${flag}`, value },
  });
}

/**
 * Parse an integer flag, falling back when it was not given.
 * Accepts numbers and digit strings; anything else is a ConfigError.
 */
export function parseIntegerFlag(
  flag: string,
  value: unknown,
  fallback: number,
  { min = 0 }: { min?: number } = {}
): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(num) || num < min) {
    throw invalidFlag(
      flag,
      value,
      min > 0 ? 'a positive integer' : 'a non-negative integer'
    );
  }
  return num;
}

export interface NumericFlags {
  minLength: number;
  maxLength: number;
  years: number;
  maxLeetRounds?: number;
  maxLeetVariants?: number;
}

export function resolveNumericFlags(
  options: Pick<
    CliOptions,
    'minlen' | 'maxlen' | 'years' | 'maxLeetRounds' | 'maxLeetVariants'
  >
): NumericFlags {
  const resolved: NumericFlags = {
    minLength: parseIntegerFlag('minlen', options.minlen, 0),
    maxLength: parseIntegerFlag('maxlen', options.maxlen, 0),
    years: parseIntegerFlag('years', options.years, DEFAULT_YEARS, { min: 1 }),
  };
  if (options.maxLeetRounds !== undefined) {
    resolved.maxLeetRounds = parseIntegerFlag(
      'max-leet-rounds',
      options.maxLeetRounds,
      0,
      { min: 1 }
    );
  }
  if (options.maxLeetVariants !== undefined) {
    resolved.maxLeetVariants = parseIntegerFlag(
      'max-leet-variants',
      options.maxLeetVariants,
      0,
      { min: 1 }
    );
  }
  return resolved;
}

/**
 * Resolve --separator-mode into a known mode or throw.
 */
export function resolveSeparatorMode(value: unknown): SeparatorMode {
  if (value === undefined || value === null || value === '') {
    return 'independent';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'independent' || raw === 'shared') {
    return raw;
  }
  throw invalidFlag('separator-mode', value, '"independent" or "shared"');
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw invalidFlag('out', value, '"text" or "json"');
}

export type WordSource =
  | { kind: 'flag'; value: string }
  | { kind: 'file'; path: string }
  | { kind: 'config' };

/**
 * --words and --input are mutually exclusive; with neither, the config's
 * base_words are used.
 */
export function resolveWordSource(
  options: Pick<CliOptions, 'words' | 'input'>
): WordSource {
  if (options.words !== undefined && options.input !== undefined) {
    throw new ConfigError({
      message: 'Options --words and --input cannot be used together.',
      context: { setting: '--words' },
    });
  }
  if (options.words !== undefined) {
    return { kind: 'flag', value: options.words };
  }
  if (options.input !== undefined) {
    return { kind: 'file', path: options.input };
  }
  return { kind: 'config' };
}
