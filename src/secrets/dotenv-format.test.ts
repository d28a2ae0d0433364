import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/core/errors.js';
import { formatDotenv, isValidKey, parseDotenv } from './dotenv-format.js';

describe('isValidKey', () => {
  it('accepts identifier tokens', () => {
    expect(isValidKey('API_KEY')).toBe(true);
    expect(isValidKey('_private')).toBe(true);
    expect(isValidKey('a1')).toBe(true);
  });

  it('rejects names with =, whitespace, newlines or a leading digit', () => {
    expect(isValidKey('A=B')).toBe(false);
    expect(isValidKey('A B')).toBe(false);
    expect(isValidKey('A\nB')).toBe(false);
    expect(isValidKey('1A')).toBe(false);
    expect(isValidKey('')).toBe(false);
  });
});

describe('parseDotenv', () => {
  it('parses plain, quoted and commented lines', () => {
    const text = ['# comment', 'A=1', 'B="two words"', "C='x#y'", '', 'D=plain # trailing'].join('\n');
    expect(parseDotenv(text)).toEqual({ A: '1', B: 'two words', C: 'x#y', D: 'plain' });
  });

  it('expands \\n inside double quotes', () => {
    expect(parseDotenv('CERT="line1\\nline2"')).toEqual({ CERT: 'line1\nline2' });
  });

  it('lets the last duplicate win', () => {
    expect(parseDotenv('A=1\nA=2\n')).toEqual({ A: '2' });
  });

  it('rejects invalid variable names', () => {
    expect(() => parseDotenv('my-key=1')).toThrow(ValidationError);
  });
});

describe('formatDotenv', () => {
  it('writes safe values unquoted', () => {
    expect(formatDotenv({ A: '1', URL: 'https://example.test/path?q=1' })).toBe(
      'A=1\nURL=https://example.test/path?q=1\n',
    );
  });

  it('single-quotes values with spaces or #', () => {
    expect(formatDotenv({ A: 'two words', B: 'x#y' })).toBe("A='two words'\nB='x#y'\n");
  });

  it('double-quotes multi-line values with escaped newlines', () => {
    expect(formatDotenv({ CERT: 'line1\nline2' })).toBe('CERT="line1\\nline2"\n');
  });

  it('writes empty values as KEY=', () => {
    expect(formatDotenv({ EMPTY: '' })).toBe('EMPTY=\n');
  });

  it('produces text that parses back to the same mapping', () => {
    const mapping = {
      PLAIN: 'value',
      SPACED: ' leading and trailing ',
      HASH: 'a#b',
      SINGLE: "it's",
      MULTI: 'one\ntwo',
      BOTH: 'say "hi"\nit\'s',
      EMPTY: '',
    };
    expect(parseDotenv(formatDotenv(mapping))).toEqual(mapping);
  });
});
