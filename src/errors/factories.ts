import type { AppError, ConfigIssue, ConfigInvalidError, FileReadFailedError, UnexpectedError } from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  fileReadFailed: (path: string, cause: unknown): FileReadFailedError => {
    const code = errnoCode(cause);
    return {
      _tag: 'FileReadFailed',
      path,
      code,
      message: code === 'ENOENT'
        ? `File not found: ${path}`
        : code === 'EACCES'
          ? `Permission denied: ${path}`
          : `Cannot read file: ${path}`,
    };
  },

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

function errnoCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
