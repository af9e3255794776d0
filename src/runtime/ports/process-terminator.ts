/**
 * How the process should end. Mirrors the CLI contract:
 * success (every address valid), failure (an invalid address or unreadable
 * input), misuse (bad arguments or configuration).
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

/**
 * Port: ends the process. Only the CLI composition root calls it.
 */
export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
