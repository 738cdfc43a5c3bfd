import { UnknownPlaceholderError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

/** Reserved slot whose occurrences are expanded over the separator pool. */
export const SEPARATORS_SLOT = 'separators';

/** Reserved slot the pipeline fills with the current base word. */
export const WORD_SLOT = 'custom_word';

export type Template = string;

/** Slot name to ordered value pool. */
export type PlaceholderPools = Readonly<Record<string, readonly string[]>>;

/**
 * How `{separators}` occurrences inside one template are filled.
 *
 * - independent: every occurrence ranges over the whole pool on its own,
 *   so two occurrences multiply the output count by |separators|².
 * - shared: all occurrences in one output string take the same separator,
 *   so the output count grows by |separators| regardless of how many there are.
 */
export type SeparatorMode = 'independent' | 'shared';

export type TemplateSegment =
  | { kind: 'literal'; text: string }
  | { kind: 'slot'; name: string; index: number };

export interface CompiledTemplate {
  source: Template;
  segments: readonly TemplateSegment[];
  /** Slot names in occurrence order, one entry per occurrence. */
  slots: readonly string[];
}

export interface ExpandOptions {
  separatorMode?: SeparatorMode;
}

const PLACEHOLDER_RE = /\{(.*?)\}/g;

/**
 * Split a template into literal text and slot occurrences.
 * A slot written twice yields two independent positions.
 */
export function parseTemplate(template: Template): CompiledTemplate {
  const segments: TemplateSegment[] = [];
  const slots: string[] = [];
  let cursor = 0;

  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: 'literal', text: template.slice(cursor, start) });
    }
    const name = match[1] ?? '';
    segments.push({ kind: 'slot', name, index: slots.length });
    slots.push(name);
    cursor = start + match[0].length;
  }
  if (cursor < template.length) {
    segments.push({ kind: 'literal', text: template.slice(cursor) });
  }

  return { source: template, segments, slots };
}

export function lookupPool(
  pools: PlaceholderPools,
  name: string
): readonly string[] | undefined {
  return Object.hasOwn(pools, name) ? pools[name] : undefined;
}

/**
 * Check that every slot the template uses has a pool.
 * Fails on the first slot, in occurrence order, that does not.
 */
export function checkTemplateSlots(
  compiled: CompiledTemplate,
  pools: PlaceholderPools
): Result<CompiledTemplate, UnknownPlaceholderError> {
  for (const slot of compiled.slots) {
    if (!lookupPool(pools, slot)) {
      return err(
        new UnknownPlaceholderError({ slot, template: compiled.source })
      );
    }
  }
  return ok(compiled);
}

interface Dimension {
  pool: readonly string[];
  positions: number[];
}

function buildDimensions(
  compiled: CompiledTemplate,
  pools: PlaceholderPools,
  mode: SeparatorMode
): Dimension[] {
  const regular: Dimension[] = [];
  const separators: Dimension[] = [];

  compiled.slots.forEach((slot, position) => {
    const pool = lookupPool(pools, slot) ?? [];
    if (slot !== SEPARATORS_SLOT) {
      regular.push({ pool, positions: [position] });
      return;
    }
    const shared = mode === 'shared' ? separators[0] : undefined;
    if (shared) {
      shared.positions.push(position);
    } else {
      separators.push({ pool, positions: [position] });
    }
  });

  // Separators vary fastest so each fixed combination of the other slots
  // is followed by all of its separator variants.
  return [...regular, ...separators];
}

function* assignments(
  dims: readonly Dimension[],
  values: string[]
): Generator<readonly string[]> {
  const [head, ...rest] = dims;
  if (!head) {
    yield values;
    return;
  }
  for (const value of head.pool) {
    for (const position of head.positions) {
      values[position] = value;
    }
    yield* assignments(rest, values);
  }
}

function render(
  compiled: CompiledTemplate,
  values: readonly string[]
): string {
  let out = '';
  for (const segment of compiled.segments) {
    out += segment.kind === 'literal' ? segment.text : (values[segment.index] ?? '');
  }
  return out;
}

/**
 * Lazily expand a template whose slots have already been checked.
 *
 * Ordering: the Cartesian product is enumerated with the first
 * non-separator occurrence varying slowest and separator occurrences
 * varying fastest. Slots without a pool are treated as empty.
 */
export function* expandCompiled(
  compiled: CompiledTemplate,
  pools: PlaceholderPools,
  options: ExpandOptions = {}
): Generator<string> {
  const dims = buildDimensions(
    compiled,
    pools,
    options.separatorMode ?? 'independent'
  );
  const values = new Array<string>(compiled.slots.length).fill('');
  for (const assignment of assignments(dims, values)) {
    yield render(compiled, assignment);
  }
}

/**
 * Expand one template into every fully substituted string.
 * No deduplication happens here.
 */
export function expandPattern(
  template: Template,
  pools: PlaceholderPools,
  options: ExpandOptions = {}
): Result<string[], UnknownPlaceholderError> {
  const checked = checkTemplateSlots(parseTemplate(template), pools);
  if (checked.isErr()) return checked;
  return ok([...expandCompiled(checked.value, pools, options)]);
}
