import { describe, it, expect } from 'vitest';
import {
  parseTokens,
  isDefaultFormatter,
  defaultLiteral,
  uniqueTokenNames,
} from '../../../src/domain/value-objects/Token.js';

describe('parseTokens', () => {
  it('should extract tokens in source order with positions', () => {
    const tokens = parseTokens('<show>/seq/<seq:04>');

    expect(tokens).toEqual([
      { name: 'show', position: 0, raw: '<show>' },
      { name: 'seq', formatter: '04', position: 11, raw: '<seq:04>' },
    ]);
  });

  it('should keep repeated tokens', () => {
    const tokens = parseTokens('<shot>/<shot>_v<version>');
    expect(tokens.map((t) => t.name)).toEqual(['shot', 'shot', 'version']);
    expect(uniqueTokenNames(tokens)).toEqual(['shot', 'version']);
  });

  it('should accept any formatter text up to the closing bracket', () => {
    const [token] = parseTokens('<dept:default=comp/x>');
    expect(token.formatter).toBe('default=comp/x');
  });

  it('should ignore brackets that do not form a token', () => {
    expect(parseTokens('a/<>/<not-a-token>/b')).toEqual([]);
  });
});

describe('default formatter helpers', () => {
  it('should detect and unwrap default literals', () => {
    expect(isDefaultFormatter('default=main')).toBe(true);
    expect(isDefaultFormatter('04')).toBe(false);
    expect(isDefaultFormatter(undefined)).toBe(false);
    expect(defaultLiteral('default=main')).toBe('main');
    expect(defaultLiteral('default=')).toBe('');
  });
});
