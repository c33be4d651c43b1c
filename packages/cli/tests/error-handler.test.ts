import { describe, expect, it } from 'vitest';
import { NotFoundError } from '@relayq/engine';
import {
  CLIError,
  createError,
  exitCodeFor,
  formatErrorMessage,
  parseBooleanOption,
  parseIntegerOption,
} from '../src/utils/error-handler.js';

describe('exitCodeFor', () => {
  it('maps errors to exit codes', () => {
    expect(exitCodeFor(createError('Backup not found: x', 2))).toBe(2);
    expect(exitCodeFor(new NotFoundError('t-1'))).toBe(2);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });
});

describe('formatErrorMessage', () => {
  it('prefixes errors and stringifies everything else', () => {
    expect(formatErrorMessage(new CLIError('bad input'))).toBe('Error: bad input');
    expect(formatErrorMessage(42)).toBe('Unknown error: 42');
  });
});

describe('parseIntegerOption', () => {
  it('passes through absent values and parses whole numbers', () => {
    expect(parseIntegerOption(undefined, '--priority')).toBeUndefined();
    expect(parseIntegerOption('7', '--priority', 1, 10)).toBe(7);
  });

  it('rejects values outside the range or with fractions', () => {
    expect(() => parseIntegerOption('2.5', '--priority')).toThrow('--priority must be a whole number');
    expect(() => parseIntegerOption('0', '--priority', 1, 10)).toThrow('--priority must be at least 1');
    expect(() => parseIntegerOption('11', '--priority', 1, 10)).toThrow('--priority must be at most 10');
  });
});

describe('parseBooleanOption', () => {
  it('accepts true and false in any case', () => {
    expect(parseBooleanOption('TRUE', '--clear-context')).toBe(true);
    expect(parseBooleanOption('false', '--clear-context')).toBe(false);
    expect(parseBooleanOption(undefined, '--clear-context')).toBeUndefined();
  });

  it('rejects anything else', () => {
    expect(() => parseBooleanOption('yes', '--clear-context')).toThrow('--clear-context must be "true" or "false"');
  });
});
