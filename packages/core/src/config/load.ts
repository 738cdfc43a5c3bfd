import fs from 'node:fs';
import path from 'node:path';

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';

import { ConfigError, ParseError, type PassmithError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { CONFIG_SCHEMA, type PassmithConfig } from './schema.js';

let cachedValidator: ValidateFunction<PassmithConfig> | undefined;

function getValidator(): ValidateFunction<PassmithConfig> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: true, strict: true });
    cachedValidator = ajv.compile<PassmithConfig>(CONFIG_SCHEMA);
  }
  return cachedValidator;
}

function describeAjvError(error: ErrorObject): string {
  const where = error.instancePath === '' ? '(root)' : error.instancePath;
  return `${where}: ${error.message ?? error.keyword}`;
}

// Integer-like keys are enumerated before all others, in numeric order,
// so such group names cannot keep their position in the file.
const INTEGER_KEY_RE = /^(0|[1-9][0-9]*)$/;

function integerGroupNames(config: PassmithConfig): string[] {
  return Object.keys(config.patterns).filter((name) => INTEGER_KEY_RE.test(name));
}

/**
 * Validate an already-parsed config document.
 */
export function parseConfig(
  raw: unknown,
  source = '<inline>'
): Result<PassmithConfig, ConfigError> {
  const validate = getValidator();
  if (!validate(raw)) {
    const problems = (validate.errors ?? []).map(describeAjvError);
    return err(
      new ConfigError({
        message: `Invalid config ${source}: ${problems.join('; ')}`,
        context: { setting: 'config', input: source, problems },
      })
    );
  }

  const numeric = integerGroupNames(raw);
  if (numeric.length > 0) {
    const problems = numeric.map(
      (name) => `/patterns: group name "${name}" must not be an integer`
    );
    return err(
      new ConfigError({
        message: `Invalid config ${source}: ${problems.join('; ')}`,
        context: {
          setting: 'patterns',
          input: source,
          problems,
          suggestion: 'Give numbered groups a non-numeric name such as "g1"',
        },
      })
    );
  }
  return ok(raw);
}

function readText(file: string): Result<string, ParseError> {
  const abs = path.resolve(process.cwd(), file);
  try {
    return ok(fs.readFileSync(abs, 'utf8'));
  } catch (cause) {
    return err(
      new ParseError({
        message: `Error reading ${abs}: ${cause instanceof Error ? cause.message : String(cause)}`,
        context: { input: abs },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
}

/**
 * Read, parse and validate a JSON config file.
 */
export function loadConfigFile(
  file: string
): Result<PassmithConfig, PassmithError> {
  const text = readText(file);
  if (text.isErr()) return text;

  let raw: unknown;
  try {
    raw = JSON.parse(text.value);
  } catch (cause) {
    return err(
      new ParseError({
        message: `Config ${file} is not valid JSON: ${cause instanceof Error ? cause.message : String(cause)}`,
        context: { input: file },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
  return parseConfig(raw, file);
}

/**
 * Trim, drop blanks and de-duplicate in first-seen order.
 */
export function normalizeBaseWords(words: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const word of words) {
    const trimmed = word.trim();
    if (trimmed === '' || seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
}

/** Split a `--words` value on commas. */
export function parseWordsFlag(value: string): string[] {
  return normalizeBaseWords(value.split(','));
}

/** Read a word list file, one base word per line. */
export function loadWordList(file: string): Result<string[], ParseError> {
  const text = readText(file);
  if (text.isErr()) return text;
  return ok(normalizeBaseWords(text.value.split(/\r?\n/)));
}
