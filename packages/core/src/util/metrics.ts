import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  EXPAND: 'expandMs',
  CASE: 'caseMs',
  LEET: 'leetMs',
  FILTER: 'filterMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export const METRIC_COUNTERS = [
  'baseWords',
  'templates',
  'expanded',
  'expandedUnique',
  'caseVariants',
  'leetVariants',
  'rejectedLength',
  'rejectedPolicy',
  'duplicatesSuppressed',
  'emitted',
] as const;

export type MetricCounter = (typeof METRIC_COUNTERS)[number];

type DurationField = (typeof METRIC_PHASES)[MetricPhase];

export type MetricsSnapshot = Record<DurationField, number> &
  Record<MetricCounter, number>;

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

function emptySnapshot(): MetricsSnapshot {
  return {
    expandMs: 0,
    caseMs: 0,
    leetMs: 0,
    filterMs: 0,
    baseWords: 0,
    templates: 0,
    expanded: 0,
    expandedUnique: 0,
    caseVariants: 0,
    leetVariants: 0,
    rejectedLength: 0,
    rejectedPolicy: 0,
    duplicatesSuppressed: 0,
    emitted: 0,
  };
}

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

/**
 * Per-run stage timings and counters.
 *
 * When disabled, timers and counters are no-ops except `emitted`, which
 * callers use for the final count.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<DurationField, TimerState>;
  private readonly snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = emptySnapshot();
    this.timers = {
      expandMs: { total: 0 },
      caseMs: { total: 0 },
      leetMs: { total: 0 },
      filterMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    const duration = this.now() - current.startedAt;
    this.recordDuration(phase, duration);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /** Time a synchronous call under `phase`. */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }

  public increment(counter: MetricCounter, by = 1): void {
    if (!this.enabled && counter !== 'emitted') {
      return;
    }
    this.snapshot[counter] += by;
  }

  public get(counter: MetricCounter): number {
    return this.snapshot[counter];
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
