import { describe, it, expect } from 'vitest';
import { parseId, parseIdList } from './shared.js';

describe('parseId', () => {
  it('parses a non-negative integer', () => {
    expect(parseId('42')).toBe(42);
    expect(parseId('0')).toBe(0);
  });

  it('rejects anything else', () => {
    expect(() => parseId('abc', '投稿ID')).toThrow('投稿ID は0以上の整数で指定してください: abc');
    expect(() => parseId('-1')).toThrow();
    expect(() => parseId('1.5')).toThrow();
  });
});

describe('parseIdList', () => {
  it('splits a comma-separated list and skips blanks', () => {
    expect(parseIdList('1, 2,,3')).toEqual([1, 2, 3]);
  });
});
