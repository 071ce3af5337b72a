import { describe, it, expect } from 'vitest';
import { findBestMatch, levenshteinDistance } from '../../src/lib/fuzzy.js';

describe('levenshteinDistance', () => {
  it('should count edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('storo', 'storo')).toBe(0);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('abc', '')).toBe(3);
  });
});

describe('findBestMatch', () => {
  it('should return the closest candidate with a confidence', () => {
    expect(findBestMatch('skoyn', ['oslos', 'skoyen'])).toEqual({
      match: 'skoyen',
      distance: 1,
      confidence: 'high',
    });
  });

  it('should prefer the first candidate on ties', () => {
    expect(findBestMatch('ab', ['ac', 'ad'])?.match).toBe('ac');
  });

  it('should report exact matches', () => {
    expect(findBestMatch('storo', ['nydalen', 'storo'])?.confidence).toBe('exact');
  });

  it('should give up beyond the maximum distance', () => {
    expect(findBestMatch('trondheim', ['oslos', 'skoyen'])).toBeNull();
    expect(findBestMatch('abc', ['xyz'], 3)?.distance).toBe(3);
    expect(findBestMatch('abc', [])).toBeNull();
  });
});
