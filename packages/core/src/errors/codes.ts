/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Generation Errors (E100–E199)
  UNKNOWN_PLACEHOLDER = 'E100',
  SUBSTITUTION_OVERFLOW = 'E101',
  INVALID_POLICY_REQUIREMENT = 'E110',
  INVALID_CASE_FORM = 'E111',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNKNOWN_PLACEHOLDER]: 30,
  [ErrorCode.SUBSTITUTION_OVERFLOW]: 31,
  [ErrorCode.INVALID_POLICY_REQUIREMENT]: 32,
  [ErrorCode.INVALID_CASE_FORM]: 33,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
