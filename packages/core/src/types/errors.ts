/**
 * Error hierarchy for passmith
 * Structured errors with codes, context and an optional cause
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  slot?: string; // Placeholder name (e.g. 'year')
  template?: string; // Template the error was raised for
  setting?: string; // Config key or CLI flag
  input?: string; // File or raw input that failed to parse
  value?: unknown; // Problematic value (may contain secrets)
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  setting?: string;
}

export interface PassmithErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'candidate',
  'word',
]);

export function redactValue(
  val: unknown,
  keys: ReadonlySet<string> = SENSITIVE_KEYS
): unknown {
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map((v) => redactValue(v, keys));
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = keys.has(k) ? '[REDACTED]' : redactValue(v, keys);
    }
    return out;
  }
  return val;
}

/**
 * Base error class for all passmith errors
 */
export abstract class PassmithError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: PassmithErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      setting: this.context?.setting,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;
    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * A template references a slot that has no value pool.
 */
export class UnknownPlaceholderError extends PassmithError {
  constructor(params: { slot: string; template: string; cause?: Error }) {
    super({
      message: `Unknown placeholder in pattern: ${params.slot}`,
      errorCode: ErrorCode.UNKNOWN_PLACEHOLDER,
      context: {
        slot: params.slot,
        template: params.template,
        suggestion: `Add a "${params.slot}" pool under "placeholders" or fix the template`,
      },
      cause: params.cause,
    });
  }

  get slot(): string {
    return this.context?.slot ?? '';
  }

  get template(): string {
    return this.context?.template ?? '';
  }
}

export type SubstitutionLimit = 'rounds' | 'variants';

/**
 * Substitution closure went past its round or size cap.
 */
export class SubstitutionOverflowError extends PassmithError {
  public readonly limit: SubstitutionLimit;
  public readonly bound: number;

  constructor(params: {
    word: string;
    limit: SubstitutionLimit;
    bound: number;
    reached: number;
  }) {
    super({
      message: `Substitution closure exceeded ${params.bound} ${params.limit}`,
      errorCode: ErrorCode.SUBSTITUTION_OVERFLOW,
      context: {
        value: { word: params.word },
        reached: params.reached,
        suggestion:
          params.limit === 'rounds'
            ? 'Check the transformation table for cyclic replacements or raise --max-leet-rounds'
            : 'Shorten the base words or raise --max-leet-variants',
      },
    });
    this.limit = params.limit;
    this.bound = params.bound;
  }
}

/**
 * Unknown policy requirement name. Reported as a warning only.
 */
export class InvalidPolicyRequirementError extends PassmithError {
  constructor(requirement: string) {
    super({
      message: `Ignoring unknown policy requirement "${requirement}"`,
      errorCode: ErrorCode.INVALID_POLICY_REQUIREMENT,
      severity: 'warn',
      context: {
        setting: 'policy_requirements',
        requirement,
        suggestion: 'Use one of: uppercase, number, special',
      },
    });
  }
}

/**
 * Unknown case form token. Reported as a warning only.
 */
export class InvalidCaseFormError extends PassmithError {
  constructor(token: string) {
    super({
      message: `Ignoring unknown case variant "${token}"`,
      errorCode: ErrorCode.INVALID_CASE_FORM,
      severity: 'warn',
      context: {
        setting: 'case_variants',
        token,
        suggestion: 'Use one of: {word_lc}, {word_uc}, {word_tc}',
      },
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends PassmithError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Config document or word list could not be read or parsed
 */
export class ParseError extends PassmithError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { input?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get input(): string | undefined {
    return this.context?.input;
  }
}

/**
 * Wraps anything that is not a PassmithError at the CLI boundary
 */
export class InternalError extends PassmithError {
  constructor(message: string, cause?: Error) {
    super({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause,
    });
  }
}

export function isPassmithError(error: unknown): error is PassmithError {
  return error instanceof PassmithError;
}
