import type { CaseForm } from '../generator/case-variants.js';
import type {
  PlaceholderPools,
  SeparatorMode,
  Template,
} from '../generator/pattern-expander.js';
import type { PolicyRequirement } from '../generator/policy-filter.js';
import type {
  ClosureLimits,
  TransformationTable,
} from '../generator/substitution-closure.js';
import type { PassmithError } from '../types/errors.js';
import type { MetricsSnapshot } from '../util/metrics.js';

export type PipelineStageName = 'expand' | 'case' | 'leet' | 'filter';

export interface PipelineOptions {
  applyLeet: boolean;
  minLength: number;
  /** 0 means unbounded. */
  maxLength: number;
  enforcePolicy: boolean;
  separatorMode?: SeparatorMode;
  closureLimits?: Partial<ClosureLimits>;
  metricsEnabled?: boolean;
  /** Clock for stage timings; defaults to performance.now(). */
  now?: () => number;
}

export interface PipelineInput {
  /** Seed words, in processing order. */
  baseWords: readonly string[];
  /**
   * Template groups; groups and templates are visited in key order.
   * Integer-like group names enumerate first, so config loading rejects them.
   */
  templatesByGroup: Readonly<Record<string, readonly Template[]>>;
  /** Pools for every slot except the word slot, which is filled per base word. */
  pools: PlaceholderPools;
  caseForms: readonly CaseForm[];
  transformations: TransformationTable;
  policy: readonly PolicyRequirement[];
  options: PipelineOptions;
}

export interface PipelineSummary {
  count: number;
  metrics: MetricsSnapshot;
}

export type CandidateEvent =
  | { kind: 'candidate'; value: string }
  | { kind: 'error'; stage: PipelineStageName; error: PassmithError }
  | { kind: 'done'; summary: PipelineSummary };

/**
 * Restartable candidate stream: every iteration reruns generation from
 * the same input and ends with exactly one `done` or `error` event.
 */
export type CandidateStream = Iterable<CandidateEvent>;

export interface PipelineResult extends PipelineSummary {
  candidates: string[];
}
