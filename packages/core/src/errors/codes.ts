/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Distribution Errors (E100–E199)
  INVALID_DISTRIBUTION_SPEC = 'E100',
  UNKNOWN_DISTRIBUTION = 'E101',
  EXPRESSION_PARSE_FAILED = 'E110',

  // Scenario Errors (E200–E299)
  INVALID_SCENARIO_ID = 'E200',
  SCENARIO_BUSY = 'E210',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  TEMPLATE_LOAD_FAILED = 'E310',

  // Lifecycle Errors (E400–E499)
  DUPLICATE_LOG_KEY = 'E400',
  EPISODE_STATE = 'E410',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_DISTRIBUTION_SPEC]: 10,
  [ErrorCode.UNKNOWN_DISTRIBUTION]: 11,
  [ErrorCode.EXPRESSION_PARSE_FAILED]: 12,
  [ErrorCode.INVALID_SCENARIO_ID]: 20,
  [ErrorCode.SCENARIO_BUSY]: 21,
  [ErrorCode.CONFIGURATION_ERROR]: 30,
  [ErrorCode.TEMPLATE_LOAD_FAILED]: 31,
  [ErrorCode.DUPLICATE_LOG_KEY]: 40,
  [ErrorCode.EPISODE_STATE]: 41,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
