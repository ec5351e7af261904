/**
 * Stable error codes and their process exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Configuration (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_PATTERN = 'E301',

  // Input documents (E400–E499)
  PARSE_ERROR = 'E400',
  IO_ERROR = 'E410',

  // Internal (E500–E599)
  INTERNAL_ERROR = 'E500',

  // Pipeline (E600–E699)
  PIPELINE_STAGE_FAILED = 'E600',
}

export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_PATTERN]: 51,
  [ErrorCode.PARSE_ERROR]: 60,
  [ErrorCode.IO_ERROR]: 61,
  [ErrorCode.INTERNAL_ERROR]: 99,
  [ErrorCode.PIPELINE_STAGE_FAILED]: 70,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
