/**
 * Portfolio Comparator
 *
 * Side-by-side analytics for two or more portfolios: one metrics row per
 * portfolio, a Pearson correlation matrix of daily returns (each pair on its
 * shared dates), and cumulative-return curves that each start at their own
 * first observation.
 *
 * Portfolios whose report cannot be produced are skipped, not fatal. Fewer
 * than two usable reports is InsufficientData; a one-row comparison is
 * never returned.
 */

import { InsufficientDataError, errorMessage } from "../lib/errors.ts";
import { cumulativeProduct, pearsonCorrelation } from "../lib/math-utils.ts";
import { computePerformance } from "./portfolio-performance.ts";
import type { AnalyticsDeps, PerformanceOptions } from "./portfolio-performance.ts";
import { alignSeries } from "./returns-aggregator.ts";
import type {
  ComparisonReport,
  PerformanceReport,
  ReturnSeries,
  SeriesPoint,
} from "./types.ts";

/** Minimum number of analysable portfolios for a comparison */
export const MIN_PORTFOLIOS_TO_COMPARE = 2;

/**
 * Symmetric correlation matrix with a unit diagonal.
 */
export function buildCorrelationMatrix(series: readonly ReturnSeries[]): number[][] {
  const n = series.length;
  const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    matrix[i][i] = 1;
    for (let j = i + 1; j < n; j++) {
      const { left, right } = alignSeries(series[i], series[j]);
      const rho = pearsonCorrelation(left, right);
      matrix[i][j] = rho;
      matrix[j][i] = rho;
    }
  }

  return matrix;
}

/**
 * Π(1 + r) from the series' own first observation.
 */
export function buildCumulativeCurve(series: ReturnSeries): SeriesPoint[] {
  const curve = cumulativeProduct(series.map((p) => p.value));
  return series.map((p, i) => ({ date: p.date, value: curve[i] }));
}

/**
 * Compare portfolios by id.
 *
 * @throws InsufficientDataError when fewer than 2 portfolios could be analysed
 */
export async function comparePortfolios(
  portfolioIds: readonly number[],
  deps: AnalyticsDeps,
  options: PerformanceOptions = {},
): Promise<ComparisonReport> {
  const uniqueIds = [...new Set(portfolioIds)];

  const results = await Promise.allSettled(
    uniqueIds.map((id) => computePerformance(id, deps, options)),
  );

  const reports: PerformanceReport[] = [];
  const skipped: ComparisonReport["skipped"] = [];

  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      reports.push(result.value);
    } else {
      const reason = errorMessage(result.reason);
      skipped.push({ portfolioId: uniqueIds[i], reason });
      console.warn(`[Comparator] Skipping portfolio ${uniqueIds[i]}: ${reason}`);
    }
  });

  if (reports.length < MIN_PORTFOLIOS_TO_COMPARE) {
    throw new InsufficientDataError(
      `Need at least ${MIN_PORTFOLIOS_TO_COMPARE} portfolios with usable data, got ${reports.length}`,
      { skipped },
    );
  }

  const labels = reports.map((r) => r.portfolioName);
  const cumulativeReturns: Record<string, SeriesPoint[]> = {};
  for (const report of reports) {
    cumulativeReturns[report.portfolioName] = buildCumulativeCurve(report.dailyReturns);
  }

  return {
    computedAt: (deps.now?.() ?? new Date()).toISOString(),
    portfolios: reports.map((r) => ({
      portfolioId: r.portfolioId,
      portfolioName: r.portfolioName,
      totalValue: r.totalValue,
      observations: r.observations,
      metrics: r.metrics,
      riskMetrics: r.riskMetrics,
    })),
    skipped,
    correlationMatrix: {
      labels,
      values: buildCorrelationMatrix(reports.map((r) => r.dailyReturns)),
    },
    cumulativeReturns,
  };
}
