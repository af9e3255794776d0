/**
 * Runtime mode of the current process.
 * Injected (DI), not inferred ad-hoc via env vars.
 */
export type RuntimeMode =
  | { kind: 'cli' }
  | { kind: 'library' }
  | { kind: 'test' };
