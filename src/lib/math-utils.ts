/**
 * @fileoverview Statistical helpers shared by the analytics engine.
 * Every function here is total: empty or degenerate input yields 0 rather
 * than NaN so that reports stay renderable.
 */

import { MIN_OBSERVATIONS_FOR_VARIANCE } from "../config/financial-constants.ts";

// ============================================================================
// STATISTICAL FUNCTIONS
// ============================================================================

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Sample variance (n - 1 denominator).
 * Returns 0 for arrays with < 2 elements.
 *
 * @example
 * variance([1, 2, 3, 4, 5]) // returns 2.5
 */
export function variance(values: readonly number[]): number {
  if (values.length < MIN_OBSERVATIONS_FOR_VARIANCE) return 0;
  const avg = mean(values);
  const sumSquares = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return sumSquares / (values.length - 1);
}

/**
 * Sample standard deviation. Returns 0 for arrays with < 2 elements.
 *
 * @example
 * stddev([1, 2, 3, 4, 5]) // returns ~1.5811
 * stddev([5]) // returns 0
 */
export function stddev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

/**
 * Sample covariance of two equal-length arrays (n - 1 denominator).
 * Only the common prefix is used when lengths differ.
 */
export function covariance(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  if (n < MIN_OBSERVATIONS_FOR_VARIANCE) return 0;
  const xs = a.slice(0, n);
  const ys = b.slice(0, n);
  const meanX = mean(xs);
  const meanY = mean(ys);
  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += (xs[i] - meanX) * (ys[i] - meanY);
  }
  return sum / (n - 1);
}

/**
 * Pearson correlation coefficient. Returns 0 when either side has zero
 * variance or there are fewer than 2 paired observations.
 *
 * @example
 * pearsonCorrelation([1, 2, 3], [2, 4, 6]) // returns 1
 */
export function pearsonCorrelation(
  a: readonly number[],
  b: readonly number[],
): number {
  const n = Math.min(a.length, b.length);
  if (n < MIN_OBSERVATIONS_FOR_VARIANCE) return 0;
  const xs = a.slice(0, n);
  const ys = b.slice(0, n);
  const denom = stddev(xs) * stddev(ys);
  if (denom === 0) return 0;
  return covariance(xs, ys) / denom;
}

/**
 * Calculates the nth percentile of an array of numbers.
 * Uses linear interpolation between closest ranks.
 *
 * @param p - Percentile to calculate (0-1, where 0.5 = median)
 * @returns The percentile value, or 0 if empty array
 *
 * @example
 * percentile([1, 2, 3, 4, 5], 0.5) // returns 3 (median)
 * percentile([1, 2, 3, 4, 5], 0.05) // returns 1.2
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = p * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;
  if (lower === upper) return sorted[lower];
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Product of (1 + r) over the series. Returns 1 for an empty series.
 */
export function compound(returns: readonly number[]): number {
  return returns.reduce((acc, r) => acc * (1 + r), 1);
}

/**
 * Running compounded curve: element t is Π(1 + r) over returns[0..t].
 *
 * @example
 * cumulativeProduct([0.1, -0.1]) // returns [1.1, 0.99]
 */
export function cumulativeProduct(returns: readonly number[]): number[] {
  const curve: number[] = [];
  let acc = 1;
  for (const r of returns) {
    acc *= 1 + r;
    curve.push(acc);
  }
  return curve;
}

/**
 * Trailing simple moving average. Positions with fewer than `window`
 * observations behind them are null.
 *
 * @example
 * trailingMean([1, 2, 3, 4], 2) // returns [null, 1.5, 2.5, 3.5]
 */
export function trailingMean(
  values: readonly number[],
  window: number,
): Array<number | null> {
  const out: Array<number | null> = [];
  let windowSum = 0;
  for (let i = 0; i < values.length; i++) {
    windowSum += values[i];
    if (i >= window) {
      windowSum -= values[i - window];
    }
    out.push(i >= window - 1 ? windowSum / window : null);
  }
  return out;
}

/**
 * Replaces NaN / ±Infinity with 0.
 */
export function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

