import { describe, expect, it } from 'vitest';
import { queryString } from './queryString.js';

describe('queryString', () => {
  it('returns an empty string without items', () => {
    expect(queryString([])).toBe('');
  });

  it('keeps order, repeated keys and value-less items', () => {
    expect(
      queryString([
        ['a', '1'],
        ['b', null],
        ['a', '2'],
      ]),
    ).toBe('a=1&b&a=2');
  });

  it('distinguishes a missing value from an empty string', () => {
    expect(queryString([['flag'], ['empty', ''], ['undef', undefined]])).toBe('flag&empty=&undef');
  });

  it('percent-encodes keys and values', () => {
    expect(queryString([['q', 'swift & go'], ['tag[]', 'a/b'], ['emoji', 'é']])).toBe(
      'q=swift%20%26%20go&tag%5B%5D=a%2Fb&emoji=%C3%A9',
    );
  });
});
