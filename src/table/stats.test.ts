/**
 * Tests for descriptive statistics
 */

import { describe, it, expect } from '@jest/globals';
import { mean, pearson, quantile, quantileSorted, quartiles, sampleStd, sortAscending } from './stats.js';

describe('quantileSorted', () => {
  it('interpolates linearly between order statistics', () => {
    expect(quantileSorted([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantileSorted([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantileSorted([1, 2, 3, 4], 0)).toBe(1);
    expect(quantileSorted([1, 2, 3, 4], 1)).toBe(4);
  });

  it('returns the only value of a single-element list', () => {
    expect(quantileSorted([7], 0.75)).toBe(7);
  });

  it('rejects an empty list and out-of-range probabilities', () => {
    expect(() => quantileSorted([], 0.5)).toThrow('Cannot compute a quantile of an empty list');
    expect(() => quantileSorted([1, 2], 1.5)).toThrow('Quantile probability must be within [0, 1], got 1.5');
  });
});

describe('quantile', () => {
  it('sorts a copy of the input', () => {
    const values = [4, 1, 3, 2];
    expect(quantile(values, 0.75)).toBe(3.25);
    expect(values).toEqual([4, 1, 3, 2]);
    expect(sortAscending(values)).toEqual([1, 2, 3, 4]);
  });
});

describe('quartiles', () => {
  it('returns q1, q3 and their spread', () => {
    expect(quartiles([3, 1, 4, 2])).toEqual({ q1: 1.75, q3: 3.25, iqr: 1.5 });
  });
});

describe('mean and sampleStd', () => {
  it('computes the mean', () => {
    expect(mean([1, 2, 3])).toBe(2);
    expect(mean([])).toBeNull();
  });

  it('uses the n - 1 denominator', () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12);
    expect(sampleStd([5])).toBeNull();
    expect(sampleStd([])).toBeNull();
  });
});

describe('pearson', () => {
  it('detects perfect linear relationships', () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBe(1);
    expect(pearson([1, 2, 3], [3, 2, 1])).toBe(-1);
  });

  it('is undefined without variance or enough pairs', () => {
    expect(pearson([1, 2, 3], [5, 5, 5])).toBeNull();
    expect(pearson([1], [2])).toBeNull();
    expect(pearson([], [])).toBeNull();
  });

  it('rejects lists of different lengths', () => {
    expect(() => pearson([1, 2], [1, 2, 3])).toThrow('Cannot correlate lists of length 2 and 3');
  });
});
