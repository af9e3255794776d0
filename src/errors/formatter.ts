import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Render an AppError for a terminal. One headline, then indented detail.
 */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const lines = error.issues.length > 0
        ? error.issues.map((issue) => `  - ${issue.path}: ${issue.message}`)
        : ['  - (no details)'];
      return [error.message, '', ...lines].join('\n');
    }

    case 'FileReadFailed':
      return error.code === undefined ? error.message : `${error.message} (${error.code})`;

    case 'Unexpected':
      return `${error.message}\nCause: ${describeCause(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    // circular structures
    return String(cause);
  }
}
