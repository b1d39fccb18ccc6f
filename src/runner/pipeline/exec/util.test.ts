import { describe, expect, it } from 'vitest';

import { appendTail, lastLines } from './util';

describe('output tail helpers', () => {
  it('keeps the most recent characters when over the limit', () => {
    expect(appendTail('abc', 'def', 4)).toBe('cdef');
    expect(appendTail('ab', 'c', 4)).toBe('abc');
  });

  it('returns the last non-empty lines', () => {
    expect(lastLines('one\n\ntwo\r\nthree\n', 2)).toEqual(['two', 'three']);
    expect(lastLines('', 3)).toEqual([]);
  });
});
