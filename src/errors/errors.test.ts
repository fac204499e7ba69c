/**
 * Error hierarchy and ErrorHandler tests
 */

import { describe, it, expect } from 'vitest';
import {
  RoffError,
  InvalidMacroNameError,
  InvalidSectionError,
  PageSpecError,
  OutputError,
  ConfigurationError,
} from './roff-error.js';
import { ErrorHandler } from './error-handler.js';

describe('error classes', () => {
  it('keep their codes and instanceof chain', () => {
    const err = new InvalidMacroNameError('S H');
    expect(err).toBeInstanceOf(InvalidMacroNameError);
    expect(err).toBeInstanceOf(RoffError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('INVALID_MACRO');
    expect(err.name).toBe('InvalidMacroNameError');
    expect(err.message).toBe('Invalid macro name "S H": only letters and digits are allowed');
  });

  it('word the empty macro name separately', () => {
    expect(new InvalidMacroNameError('').message).toBe('Macro name must not be empty');
  });

  it('carry the offending section', () => {
    const err = new InvalidSectionError('9');
    expect(err.section).toBe('9');
    expect(err.code).toBe('INVALID_SECTION');
  });

  it('carry page description issues', () => {
    const err = new PageSpecError('Page description has 2 problems', ['a', 'b']);
    expect(err.issues).toEqual(['a', 'b']);
    expect(err.code).toBe('PAGE_SPEC_ERROR');
  });
});

describe('ErrorHandler.toUserMessage', () => {
  it('passes page and macro errors through', () => {
    expect(ErrorHandler.toUserMessage(new InvalidSectionError('0'))).toBe(
      'Invalid manual section "0": must start with a digit from 1 to 8'
    );
  });

  it('names the file for output errors', () => {
    expect(ErrorHandler.toUserMessage(new OutputError('EACCES', { path: '/usr/share/man/man1/x.1' }))).toBe(
      'Could not update /usr/share/man/man1/x.1. Check the path and permissions.'
    );
    expect(ErrorHandler.toUserMessage(new OutputError('EACCES'))).toBe(
      'Could not update output file. Check the path and permissions.'
    );
  });

  it('suggests a reset for config errors', () => {
    expect(ErrorHandler.toUserMessage(new ConfigurationError('Unknown config key: x'))).toBe(
      'Unknown config key: x. Run `roffsmith config reset` to restore defaults.'
    );
  });

  it('adds the code for other RoffErrors', () => {
    expect(ErrorHandler.toUserMessage(new RoffError('boom', 'UNKNOWN_ERROR'))).toBe('boom (UNKNOWN_ERROR)');
  });

  it('handles plain errors and other values', () => {
    expect(ErrorHandler.toUserMessage(new Error('plain'))).toBe('plain');
    expect(ErrorHandler.toUserMessage('nope')).toBe('An unexpected error occurred.');
  });
});

describe('ErrorHandler.wrap', () => {
  it('returns data on success', async () => {
    await expect(ErrorHandler.wrap(async () => 7)).resolves.toEqual({ data: 7 });
  });

  it('returns RoffErrors as they are', async () => {
    const err = new OutputError('failed', { path: 'a.1' });
    const result = await ErrorHandler.wrap(async () => {
      throw err;
    }, { page: 'a' });
    expect(result.error).toBe(err);
  });

  it('attaches context to a RoffError that has none', async () => {
    const result = await ErrorHandler.wrap(async () => {
      throw new InvalidSectionError('x');
    }, { page: 'a.json' });
    expect(result.error).toBeInstanceOf(InvalidSectionError);
    expect(result.error?.context).toEqual({ page: 'a.json' });
    expect(result.error?.message).toBe('Invalid manual section "x": must start with a digit from 1 to 8');
  });

  it('wraps other errors as UNKNOWN_ERROR', async () => {
    const result = await ErrorHandler.wrap(async () => {
      throw new TypeError('bad');
    }, { step: 'render' });
    expect(result.error?.code).toBe('UNKNOWN_ERROR');
    expect(result.error?.message).toBe('bad');
    expect(result.error?.context).toEqual({ step: 'render' });
  });
});
