// @passmith/core entry point
//
// - Generation components: pattern expansion, substitution closure, case
//   forms and policy filtering (./generator).
// - Pipeline: iterateCandidates() streams, generateCandidates() collects.
// - Config: JSON document loading/validation and pipeline input resolution.
// - Errors: typed PassmithError hierarchy, Result, codes and presenter.

// Generation components
export {
  SEPARATORS_SLOT,
  WORD_SLOT,
  parseTemplate,
  checkTemplateSlots,
  expandCompiled,
  expandPattern,
  lookupPool,
  type Template,
  type TemplateSegment,
  type CompiledTemplate,
  type PlaceholderPools,
  type SeparatorMode,
  type ExpandOptions,
} from './generator/pattern-expander.js';
export {
  DEFAULT_CLOSURE_LIMITS,
  oneStep,
  closure,
  type ClosureLimits,
  type TransformationTable,
} from './generator/substitution-closure.js';
export {
  CASE_FORMS,
  applyCaseForm,
  applyCaseForms,
  parseCaseForms,
  toTitleCase,
  type CaseForm,
  type ParsedCaseForms,
} from './generator/case-variants.js';
export {
  isPolicyRequirement,
  parsePolicyRequirements,
  satisfies,
  type PolicyRequirement,
  type ParsedPolicy,
} from './generator/policy-filter.js';

// Pipeline
export {
  compileTemplates,
  generateCandidates,
  iterateCandidates,
  withinLength,
} from './pipeline/orchestrator.js';
export type {
  CandidateEvent,
  CandidateStream,
  PipelineInput,
  PipelineOptions,
  PipelineResult,
  PipelineStageName,
  PipelineSummary,
} from './pipeline/types.js';

// Config
export { CONFIG_SCHEMA, type PassmithConfig } from './config/schema.js';
export {
  loadConfigFile,
  loadWordList,
  normalizeBaseWords,
  parseConfig,
  parseWordsFlag,
} from './config/load.js';
export {
  BUILTIN_SLOTS,
  DEFAULT_YEARS,
  buildPlaceholderPools,
  normalizeTransformations,
  resolvePipelineInput,
  yearPool,
  type PoolOptions,
  type ResolveInputOptions,
  type ResolvedInput,
} from './config/resolve.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  PassmithError,
  UnknownPlaceholderError,
  SubstitutionOverflowError,
  InvalidPolicyRequirementError,
  InvalidCaseFormError,
  ConfigError,
  ParseError,
  InternalError,
  isPassmithError,
  type ErrorContext,
  type SerializedError,
  type SubstitutionLimit,
  type UserError,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  collect,
  type Result,
} from './types/result.js';

// Utilities
export { OrderedSet, dedupeOrdered } from './util/ordered-set.js';
export {
  MetricsCollector,
  METRIC_COUNTERS,
  METRIC_PHASES,
  type MetricCounter,
  type MetricPhase,
  type MetricsCollectorOptions,
  type MetricsSnapshot,
} from './util/metrics.js';
