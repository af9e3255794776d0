import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers. Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - every address valid
  | { kind: 'general_error' }  // 1 - an address is invalid, or input unreadable
  | { kind: 'misuse' };        // 2 - bad arguments or configuration

/**
 * Convert ExitCode to the ProcessTerminator's format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Convert ExitCode to a numeric value for raw process.exit().
 * Only for composition-root paths where DI is unavailable.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
