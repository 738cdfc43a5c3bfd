import { applyCaseForms } from '../generator/case-variants.js';
import {
  WORD_SLOT,
  checkTemplateSlots,
  expandCompiled,
  parseTemplate,
  type CompiledTemplate,
  type PlaceholderPools,
} from '../generator/pattern-expander.js';
import { satisfies } from '../generator/policy-filter.js';
import { closure } from '../generator/substitution-closure.js';
import type {
  PassmithError,
  UnknownPlaceholderError,
} from '../types/errors.js';
import { collect, err, ok, type Result } from '../types/result.js';
import { MetricsCollector } from '../util/metrics.js';
import type {
  CandidateEvent,
  CandidateStream,
  PipelineInput,
  PipelineOptions,
  PipelineResult,
} from './types.js';

/**
 * Parse every template and check its slots against the pools plus the
 * word slot. Templates come back in group order, then template order.
 */
export function compileTemplates(
  templatesByGroup: PipelineInput['templatesByGroup'],
  pools: PlaceholderPools
): Result<CompiledTemplate[], UnknownPlaceholderError> {
  const withWord: PlaceholderPools = { ...pools, [WORD_SLOT]: [''] };
  const compiled = Object.values(templatesByGroup).flatMap((templates) =>
    templates.map((template) =>
      checkTemplateSlots(parseTemplate(template), withWord)
    )
  );
  return collect(compiled);
}

export function withinLength(
  candidate: string,
  options: Pick<PipelineOptions, 'minLength' | 'maxLength'>
): boolean {
  if (candidate.length < options.minLength) return false;
  return options.maxLength === 0 || candidate.length <= options.maxLength;
}

function* runPipeline(
  input: PipelineInput,
  templates: readonly CompiledTemplate[]
): Generator<CandidateEvent> {
  const { options } = input;
  const metrics = new MetricsCollector({
    enabled: options.metricsEnabled ?? true,
    now: options.now,
  });
  metrics.increment('baseWords', input.baseWords.length);
  metrics.increment('templates', templates.length);

  // Dedup state spans base words so lazy per-word processing yields the
  // same order as expanding every word first.
  // Membership only; emission order comes from the loops below.
  const expanded = new Set<string>();
  const cased = new Set<string>();
  const emitted = new Set<string>();

  for (const word of input.baseWords) {
    const pools: PlaceholderPools = { ...input.pools, [WORD_SLOT]: [word] };

    for (const template of templates) {
      const raw = metrics.measure('EXPAND', () => [
        ...expandCompiled(template, pools, {
          separatorMode: options.separatorMode,
        }),
      ]);
      metrics.increment('expanded', raw.length);

      for (const rawCandidate of raw) {
        if (expanded.has(rawCandidate)) continue;
        expanded.add(rawCandidate);
        metrics.increment('expandedUnique');

        const variants = metrics.measure('CASE', () =>
          applyCaseForms(rawCandidate, input.caseForms)
        );

        for (const variant of variants) {
          if (cased.has(variant)) continue;
          cased.add(variant);
          metrics.increment('caseVariants');

          let leet: Iterable<string> = [variant];
          if (options.applyLeet) {
            const result = metrics.measure('LEET', () =>
              closure(variant, input.transformations, options.closureLimits)
            );
            if (result.isErr()) {
              yield { kind: 'error', stage: 'leet', error: result.error };
              return;
            }
            leet = result.value;
            metrics.increment('leetVariants', result.value.size);
          }

          for (const candidate of leet) {
            metrics.begin('FILTER');
            const fitsLength = withinLength(candidate, options);
            const fitsPolicy =
              !fitsLength ||
              !options.enforcePolicy ||
              satisfies(candidate, input.policy);
            metrics.end('FILTER');

            if (!fitsLength) {
              metrics.increment('rejectedLength');
            } else if (!fitsPolicy) {
              metrics.increment('rejectedPolicy');
            } else if (emitted.has(candidate)) {
              metrics.increment('duplicatesSuppressed');
            } else {
              emitted.add(candidate);
              metrics.increment('emitted');
              yield { kind: 'candidate', value: candidate };
            }
          }
        }
      }
    }
  }

  yield {
    kind: 'done',
    summary: {
      count: metrics.get('emitted'),
      metrics: metrics.snapshotMetrics(),
    },
  };
}

/**
 * Lazily generate candidates.
 *
 * Templates are compiled before anything is produced, so an unknown
 * placeholder fails here rather than part-way through the stream.
 */
export function iterateCandidates(
  input: PipelineInput
): Result<CandidateStream, UnknownPlaceholderError> {
  const compiled = compileTemplates(input.templatesByGroup, input.pools);
  if (compiled.isErr()) return compiled;
  const templates = compiled.value;
  return ok({
    [Symbol.iterator]: () => runPipeline(input, templates),
  });
}

/**
 * Run the whole pipeline and collect the final ordered candidate list.
 */
export function generateCandidates(
  input: PipelineInput
): Result<PipelineResult, PassmithError> {
  const stream = iterateCandidates(input);
  if (stream.isErr()) return stream;

  const candidates: string[] = [];
  for (const event of stream.value) {
    switch (event.kind) {
      case 'candidate':
        candidates.push(event.value);
        break;
      case 'error':
        return err(event.error);
      case 'done':
        return ok({ candidates, ...event.summary });
    }
  }
  // runPipeline always finishes with a done or error event
  return ok({
    candidates,
    count: candidates.length,
    metrics: new MetricsCollector().snapshotMetrics(),
  });
}
