/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display. Separates content from presentation.
 *
 * `raw` output (e.g. JSON) is printed verbatim to stdout whatever the outcome,
 * so it can be piped.
 */
export type CliOutput =
  | {
      readonly kind?: 'styled';
      readonly message: string;
      readonly details?: readonly string[];
      readonly warnings?: readonly string[];
      readonly suggestions?: readonly string[];
    }
  | { readonly kind: 'raw'; readonly text: string };

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    warnings?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      warnings: options?.warnings,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Failure carrying raw output (e.g. a JSON report with invalid entries).
 */
export function rawFailure(text: string, exitCode: ExitCode = { kind: 'general_error' }): CliResult {
  return { kind: 'failure', exitCode, output: { kind: 'raw', text } };
}

/**
 * Misuse failure (bad arguments, bad configuration).
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
