import { describe, it, expect } from 'vitest';
import { Err } from '../../../src/errors/factories.js';
import { formatAppError } from '../../../src/errors/formatter.js';

describe('Err.fileReadFailed', () => {
  const errno = (code: string) => Object.assign(new Error(code), { code });

  it('names the common errno cases', () => {
    expect(Err.fileReadFailed('a.txt', errno('ENOENT')).message).toBe('File not found: a.txt');
    expect(Err.fileReadFailed('a.txt', errno('EACCES')).message).toBe('Permission denied: a.txt');
    expect(Err.fileReadFailed('a.txt', errno('EISDIR')).message).toBe('Cannot read file: a.txt');
  });

  it('tolerates causes without a code', () => {
    const error = Err.fileReadFailed('a.txt', 'boom');
    expect(error.code).toBeUndefined();
    expect(formatAppError(error)).toBe('Cannot read file: a.txt');
  });
});

describe('formatAppError', () => {
  it('lists config issues', () => {
    const error = Err.configInvalid([{ path: 'BTCADDR_OUTPUT', message: 'Invalid enum value' }]);
    expect(formatAppError(error)).toBe('Invalid configuration\n\n  - BTCADDR_OUTPUT: Invalid enum value');
  });

  it('says so when there are no issue details', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid configuration\n\n  - (no details)');
  });

  it('includes the cause of unexpected errors', () => {
    expect(formatAppError(Err.unexpected('Command failed', new TypeError('nope')))).toBe(
      'Command failed\nCause: TypeError: nope',
    );
    expect(formatAppError(Err.unexpected('Command failed', { step: 2 }))).toBe('Command failed\nCause: {"step":2}');
  });
});
