import { describe, it, expect } from 'vitest';
import { formatOutput, formatResult } from '../../../src/cli/output-formatter.js';
import { success, failure, rawFailure, misuse } from '../../../src/cli/types/cli-result.js';
import { toNumericExitCode, toProcessExitCode } from '../../../src/cli/types/exit-code.js';

const stripAnsi = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '');

describe('formatOutput', () => {
  it('prints raw output verbatim', () => {
    expect(formatOutput({ kind: 'raw', text: '[]' }, true)).toBe('[]');
  });

  it('marks success and failure', () => {
    expect(stripAnsi(formatOutput({ message: 'ok' }))).toBe('✅ ok');
    expect(stripAnsi(formatOutput({ message: 'bad' }, true))).toBe('❌ bad');
  });

  it('lays out details, warnings and suggestions in that order', () => {
    const text = stripAnsi(
      formatOutput({ message: 'm', details: ['d'], warnings: ['w'], suggestions: ['s'] }, true),
    );
    expect(text.split('\n')).toEqual([
      '❌ m',
      '',
      '  • d',
      '',
      '⚠️  Warnings:',
      '  • w',
      '',
      '💡 Suggestions:',
      '  • s',
    ]);
  });
});

describe('formatResult', () => {
  it('is empty for a success without output', () => {
    expect(formatResult(success())).toBe('');
  });

  it('formats raw failures without decoration', () => {
    expect(formatResult(rawFailure('{"valid":false}'))).toBe('{"valid":false}');
  });
});

describe('exit codes', () => {
  it('failure defaults to a general error, misuse to 2', () => {
    const f = failure('x');
    const m = misuse('y');
    if (f.kind !== 'failure' || m.kind !== 'failure') throw new Error('expected failures');
    expect(toNumericExitCode(f.exitCode)).toBe(1);
    expect(toNumericExitCode(m.exitCode)).toBe(2);
    expect(toNumericExitCode({ kind: 'success' })).toBe(0);
  });

  it('maps to the terminator codes', () => {
    expect(toProcessExitCode({ kind: 'general_error' })).toEqual({ kind: 'failure' });
    expect(toProcessExitCode({ kind: 'misuse' })).toEqual({ kind: 'misuse' });
    expect(toProcessExitCode({ kind: 'success' })).toEqual({ kind: 'success' });
  });
});
