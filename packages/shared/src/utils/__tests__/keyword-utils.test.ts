import { describe, it, expect } from 'vitest';
import { parseKeywords, escapeLikePattern, containsPattern } from '../keyword-utils';

describe('parseKeywords', () => {
  it('splits on commas and trims', () => {
    expect(parseKeywords(' alpha , beta,gamma ')).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('drops empty terms', () => {
    expect(parseKeywords('alpha,, ,beta')).toEqual(['alpha', 'beta']);
  });

  it('returns nothing for blank input', () => {
    expect(parseKeywords(undefined)).toEqual([]);
    expect(parseKeywords('   ')).toEqual([]);
  });

  it('rejects strings over 200 characters', () => {
    expect(() => parseKeywords('x'.repeat(201))).toThrow(RangeError);
  });

  it('accepts exactly 200 characters', () => {
    expect(parseKeywords('x'.repeat(200))).toHaveLength(1);
  });
});

describe('escapeLikePattern', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLikePattern('50%_off\\now')).toBe('50\\%\\_off\\\\now');
  });
});

describe('containsPattern', () => {
  it('lowercases and wraps in wildcards', () => {
    expect(containsPattern('Alpha')).toBe('%alpha%');
  });

  it('escapes literal percent signs', () => {
    expect(containsPattern('100%')).toBe('%100\\%%');
  });
});
