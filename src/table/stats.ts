/**
 * Descriptive Statistics
 *
 * Quantiles use linear interpolation between order statistics: for sorted
 * values x[0..n-1] and probability p, h = (n - 1) * p and
 * q = x[floor(h)] + (h - floor(h)) * (x[floor(h) + 1] - x[floor(h)]).
 * The outlier fences and the report both depend on this exact rule, so it is
 * a compatibility contract: changing it changes which rows get dropped.
 *
 * @module table/stats
 */

/**
 * Quantile of an ascending-sorted, non-empty list.
 *
 * @throws Error on an empty list or p outside [0, 1]
 *
 * @example quantileSorted([1, 2, 3, 4], 0.25) // 1.75
 */
export function quantileSorted(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error('Cannot compute a quantile of an empty list');
  }
  if (!(p >= 0 && p <= 1)) {
    throw new Error(`Quantile probability must be within [0, 1], got ${p}`);
  }

  const h = (sorted.length - 1) * p;
  const lower = Math.floor(h);
  const upper = Math.min(lower + 1, sorted.length - 1);
  return sorted[lower] + (h - lower) * (sorted[upper] - sorted[lower]);
}

/**
 * Quantile of an unsorted list (the input is not modified).
 */
export function quantile(values: readonly number[], p: number): number {
  return quantileSorted(sortAscending(values), p);
}

/**
 * Copy of the values in ascending order.
 */
export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * First and third quartiles and the interquartile range.
 */
export interface Quartiles {
  q1: number;
  q3: number;
  iqr: number;
}

export function quartiles(values: readonly number[]): Quartiles {
  const sorted = sortAscending(values);
  const q1 = quantileSorted(sorted, 0.25);
  const q3 = quantileSorted(sorted, 0.75);
  return { q1, q3, iqr: q3 - q1 };
}

/**
 * Arithmetic mean, or null for an empty list.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator), or null for fewer than two values.
 */
export function sampleStd(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) {
    return null;
  }
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Pearson correlation of two equally long lists, or null when it is undefined
 * (fewer than two pairs, or either side has zero variance).
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  if (xs.length !== ys.length) {
    throw new Error(`Cannot correlate lists of length ${xs.length} and ${ys.length}`);
  }
  const meanX = mean(xs);
  const meanY = mean(ys);
  if (meanX === null || meanY === null || xs.length < 2) {
    return null;
  }

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return null;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
}
