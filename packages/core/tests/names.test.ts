/**
 * Tests for alias parsing and description checks
 */

import { describe, it, expect } from 'vitest';
import { ConfigErrorCode, ConfigurationError } from '../src/errors.js';
import { isValidAlias, joinNames, parseNames, validateDescription } from '../src/names.js';

describe('parseNames', () => {
  it('should split the serialized form on "|"', () => {
    expect(parseNames('textutils|tu', 'command group')).toEqual(['textutils', 'tu']);
  });

  it('should accept a list and drop empty entries', () => {
    expect(parseNames(['metrics', ' ', 'mt'], 'command group')).toEqual(['metrics', 'mt']);
  });

  it('should trim entries of the serialized form', () => {
    expect(parseNames(' calc | c ', 'command group')).toEqual(['calc', 'c']);
  });

  it('should return a frozen list', () => {
    expect(Object.isFrozen(parseNames('cc', 'command'))).toBe(true);
  });

  it('should reject an empty declaration', () => {
    expect(() => parseNames('', 'command')).toThrow('Invalid command names (empty).');
  });

  it('should quote a declaration made only of separators', () => {
    expect(() => parseNames('||', 'command')).toThrow('Invalid command names: "||".');
  });

  it('should reject upper case and punctuation', () => {
    expect(() => parseNames('Calc', 'command group')).toThrow('Invalid command group name: "Calc".');
    expect(() => parseNames('count-words', 'command')).toThrow('Invalid command name: "count-words".');
  });

  it('should report a repeated alias as a name collision', () => {
    try {
      parseNames('cw|cw', 'command');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: ConfigErrorCode.NAME_COLLISION });
    }
  });
});

describe('isValidAlias', () => {
  it('should accept lowercase letters and digits only', () => {
    expect(isValidAlias('sdt2')).toBe(true);
    expect(isValidAlias('')).toBe(false);
    expect(isValidAlias('a b')).toBe(false);
    expect(isValidAlias('é')).toBe(false);
  });
});

describe('validateDescription', () => {
  it('should return a non-empty description unchanged', () => {
    expect(validateDescription(' count words ', '"cw" command')).toBe(' count words ');
  });

  it('should reject whitespace-only text', () => {
    expect(() => validateDescription('  \t', '"cw" command')).toThrow('"cw" command description is invalid (empty).');
  });
});

describe('joinNames', () => {
  it('should join with "|"', () => {
    expect(joinNames(['repeatword', 'repw'])).toBe('repeatword|repw');
  });
});
