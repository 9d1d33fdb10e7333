/**
 * Performance Metrics Calculator
 *
 * Return and risk-adjusted performance statistics for a daily return series.
 *
 * Metrics:
 * - Total return (compounded)
 * - Annualized return (arithmetic mean x 252)
 * - Volatility (sample stddev x sqrt(252))
 * - Sharpe Ratio (annualized return / volatility)
 * - Sortino Ratio (annualized return / annualized downside deviation)
 * - Calmar Ratio (annualized return / |max drawdown|)
 * - Maximum Drawdown (worst peak-to-trough of the compounded curve, <= 0)
 * - Beta / Alpha against a benchmark, CAPM style
 *
 * Degenerate denominators (zero volatility, no downside, no drawdown, flat
 * benchmark) yield 0. Nothing here throws on numeric input.
 */

import { TRADING_DAYS_PER_YEAR } from "../config/financial-constants.ts";
import {
  compound,
  covariance,
  cumulativeProduct,
  finiteOrZero,
  mean,
  stddev,
  variance,
} from "../lib/math-utils.ts";
import { alignSeries, seriesValues } from "./returns-aggregator.ts";
import type { PerformanceMetrics, ReturnSeries } from "./types.ts";

export interface CapmAssumptions {
  /** Annual risk-free rate, fractional (0.05 = 5%) */
  riskFreeRate: number;
  /** Assumed annual market return, fractional */
  marketReturn: number;
}

// ---------------------------------------------------------------------------
// Return metrics
// ---------------------------------------------------------------------------

/** Π(1 + r) - 1. Empty series → 0. */
export function calculateTotalReturn(returns: readonly number[]): number {
  return compound(returns) - 1;
}

/** mean(r) × 252. */
export function calculateAnnualizedReturn(returns: readonly number[]): number {
  return mean(returns) * TRADING_DAYS_PER_YEAR;
}

/** stddev(r) × √252. Fewer than 2 observations → 0. */
export function calculateVolatility(returns: readonly number[]): number {
  return stddev(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

// ---------------------------------------------------------------------------
// Risk-adjusted ratios
// ---------------------------------------------------------------------------

export function calculateSharpeRatio(returns: readonly number[]): number {
  const volatility = calculateVolatility(returns);
  if (volatility === 0) return 0;
  return finiteOrZero(calculateAnnualizedReturn(returns) / volatility);
}

/**
 * Root mean square of the negative returns (not annualized).
 * No negative observations → 0.
 */
export function calculateDownsideDeviation(returns: readonly number[]): number {
  const negatives = returns.filter((r) => r < 0);
  if (negatives.length === 0) return 0;
  return Math.sqrt(mean(negatives.map((r) => r * r)));
}

export function calculateSortinoRatio(returns: readonly number[]): number {
  const downside = calculateDownsideDeviation(returns);
  if (downside === 0) return 0;
  return finiteOrZero(
    calculateAnnualizedReturn(returns) / (downside * Math.sqrt(TRADING_DAYS_PER_YEAR)),
  );
}

/**
 * Minimum of (cum - runningMax) / runningMax over the compounded curve
 * started at the first observation. Always <= 0.
 */
export function calculateMaxDrawdown(returns: readonly number[]): number {
  const curve = cumulativeProduct(returns);
  let peak = -Infinity;
  let worst = 0;

  for (const value of curve) {
    if (value > peak) peak = value;
    if (peak <= 0) continue;
    const drawdown = (value - peak) / peak;
    if (drawdown < worst) worst = drawdown;
  }

  return worst;
}

export function calculateCalmarRatio(returns: readonly number[]): number {
  const maxDrawdown = calculateMaxDrawdown(returns);
  if (maxDrawdown === 0) return 0;
  return finiteOrZero(calculateAnnualizedReturn(returns) / Math.abs(maxDrawdown));
}

// ---------------------------------------------------------------------------
// Benchmark-relative
// ---------------------------------------------------------------------------

/**
 * cov(r, bench) / var(bench) over the shared dates of both series.
 * Fewer than 2 shared dates or a flat benchmark → 0.
 */
export function calculateBeta(
  series: ReturnSeries,
  benchmark: ReturnSeries,
): number {
  const { left, right } = alignSeries(series, benchmark);
  const benchVariance = variance(right);
  if (benchVariance === 0) return 0;
  return finiteOrZero(covariance(left, right) / benchVariance);
}

/**
 * Jensen's alpha: portfolioReturn - (rf + beta × (marketReturn - rf)).
 */
export function calculateAlpha(
  annualizedReturn: number,
  beta: number,
  assumptions: CapmAssumptions,
): number {
  const { riskFreeRate, marketReturn } = assumptions;
  return finiteOrZero(
    annualizedReturn - (riskFreeRate + beta * (marketReturn - riskFreeRate)),
  );
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

/**
 * All performance metrics for one series. When `benchmark` is null, beta
 * and alpha are reported as 0; callers flag them as unavailable.
 */
export function calculatePerformanceMetrics(
  series: ReturnSeries,
  benchmark: ReturnSeries | null,
  assumptions: CapmAssumptions,
): PerformanceMetrics {
  const returns = seriesValues(series);
  const annualizedReturn = calculateAnnualizedReturn(returns);
  const beta = benchmark ? calculateBeta(series, benchmark) : 0;

  return {
    totalReturn: calculateTotalReturn(returns),
    annualizedReturn,
    volatility: calculateVolatility(returns),
    sharpeRatio: calculateSharpeRatio(returns),
    sortinoRatio: calculateSortinoRatio(returns),
    calmarRatio: calculateCalmarRatio(returns),
    maxDrawdown: calculateMaxDrawdown(returns),
    beta,
    alpha: benchmark ? calculateAlpha(annualizedReturn, beta, assumptions) : 0,
  };
}
