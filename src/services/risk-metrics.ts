/**
 * Risk Metrics Calculator
 *
 * Historical (empirical) tail-risk measures on a daily return series, plus
 * tracking error against a benchmark.
 */

import {
  TRADING_DAYS_PER_YEAR,
  VAR_CONFIDENCE_95,
  VAR_CONFIDENCE_99,
} from "../config/financial-constants.ts";
import { mean, percentile, stddev } from "../lib/math-utils.ts";
import { alignSeries, seriesValues } from "./returns-aggregator.ts";
import type { ReturnSeries, RiskMetrics } from "./types.ts";

/**
 * Historical VaR at `confidence`: the (1 - confidence) percentile of returns,
 * with linear interpolation between ranks. Usually negative. Empty → 0.
 */
export function calculateVaR(returns: readonly number[], confidence: number): number {
  return percentile(returns, 1 - confidence);
}

/**
 * Historical CVaR (expected shortfall): mean of all returns at or below VaR.
 * Empty → 0.
 */
export function calculateCVaR(returns: readonly number[], confidence: number): number {
  if (returns.length === 0) return 0;
  const threshold = calculateVaR(returns, confidence);
  // threshold >= min(returns), so the tail always holds at least one value
  return mean(returns.filter((r) => r <= threshold));
}

/**
 * stddev(r - bench) × √252 over the shared dates.
 */
export function calculateTrackingError(
  series: ReturnSeries,
  benchmark: ReturnSeries,
): number {
  const { left, right } = alignSeries(series, benchmark);
  const active = left.map((r, i) => r - right[i]);
  return stddev(active) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * VaR / CVaR at 95% and 99%, and tracking error when a benchmark is given
 * (0 otherwise; callers flag it as unavailable).
 */
export function calculateRiskMetrics(
  series: ReturnSeries,
  benchmark: ReturnSeries | null,
): RiskMetrics {
  const returns = seriesValues(series);
  return {
    var95: calculateVaR(returns, VAR_CONFIDENCE_95),
    var99: calculateVaR(returns, VAR_CONFIDENCE_99),
    cvar95: calculateCVaR(returns, VAR_CONFIDENCE_95),
    cvar99: calculateCVaR(returns, VAR_CONFIDENCE_99),
    trackingError: benchmark ? calculateTrackingError(series, benchmark) : 0,
  };
}
