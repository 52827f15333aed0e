/**
 * Error Code Infrastructure
 * Stable error codes, exit codes, and HTTP status mappings.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema model (E001–E099)
  INVALID_SCHEMA_STRUCTURE = 'E010',
  INVALID_REFERENCE = 'E011',
  CIRCULAR_REFERENCE_DETECTED = 'E012',

  // Generation (E100–E199)
  CONSTRAINT_VIOLATION = 'E100',
  GENERATION_LIMIT_EXCEEDED = 'E101',
  UNSUPPORTED_KIND = 'E102',
  UNSUPPORTED_FORMAT = 'E103',

  // Configuration (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Specification documents (E400–E499)
  PARSE_ERROR = 'E400',
  UNSUPPORTED_SPEC_VERSION = 'E401',
  OPERATION_NOT_FOUND = 'E402',

  // Internal (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 20,
  [ErrorCode.INVALID_REFERENCE]: 21,
  [ErrorCode.CIRCULAR_REFERENCE_DETECTED]: 22,
  [ErrorCode.CONSTRAINT_VIOLATION]: 30,
  [ErrorCode.GENERATION_LIMIT_EXCEEDED]: 31,
  [ErrorCode.UNSUPPORTED_KIND]: 32,
  [ErrorCode.UNSUPPORTED_FORMAT]: 33,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.UNSUPPORTED_SPEC_VERSION]: 61,
  [ErrorCode.OPERATION_NOT_FOUND]: 62,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
