/**
 * Portfolio Performance Engine
 *
 * Builds a PerformanceReport for one portfolio from a fresh snapshot of its
 * allocations and positions:
 *
 * 1. Load the PortfolioDefinition once (no ambient portfolio state)
 * 2. Fetch every constituent's history and the benchmark concurrently
 * 3. Aggregate allocation-weighted daily returns
 * 4. Derive performance metrics (return, volatility, Sharpe, Sortino,
 *    Calmar, drawdown, beta, alpha) and risk metrics (VaR, CVaR, tracking
 *    error)
 *
 * A constituent whose history cannot be fetched contributes 0 and is listed
 * in `missingTickers`. A benchmark failure degrades beta/alpha/tracking
 * error to 0 with `availability` set to "unavailable"; the report is still
 * returned.
 */

import { MIN_OBSERVATIONS_FOR_VARIANCE } from "../config/financial-constants.ts";
import {
  InsufficientHistoryError,
  PortfolioNotFoundError,
  errorMessage,
} from "../lib/errors.ts";
import { calculatePerformanceMetrics } from "./performance-metrics.ts";
import type { CapmAssumptions } from "./performance-metrics.ts";
import type { PortfolioRepository } from "./portfolio-repository.ts";
import { lookbackWindow, toIsoDate } from "./price-store.ts";
import type { PriceSeriesStore } from "./price-store.ts";
import {
  aggregateWeightedReturns,
  alignSeries,
  computeDailyReturns,
} from "./returns-aggregator.ts";
import type { WeightedHistory } from "./returns-aggregator.ts";
import { calculateRiskMetrics } from "./risk-metrics.ts";
import { UNKNOWN_SECTOR } from "./market-data.ts";
import type {
  BenchmarkStatus,
  PerformanceReport,
  PortfolioDefinition,
  PositionBreakdown,
  PriceBar,
  ReturnSeries,
} from "./types.ts";

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface AnalyticsSettings extends CapmAssumptions {
  benchmarkTicker: string;
  /** Default history window in calendar days */
  lookbackDays: number;
}

export interface AnalyticsDeps {
  repository: PortfolioRepository;
  prices: PriceSeriesStore;
  settings: AnalyticsSettings;
  now?: () => Date;
}

export interface PerformanceOptions {
  lookbackDays?: number;
}

// ---------------------------------------------------------------------------
// Snapshot loading
// ---------------------------------------------------------------------------

export async function loadPortfolioDefinition(
  repository: PortfolioRepository,
  portfolioId: number,
): Promise<PortfolioDefinition> {
  const definition = await repository.findPortfolio(portfolioId);
  if (!definition) {
    throw new PortfolioNotFoundError(portfolioId);
  }
  return definition;
}

// ---------------------------------------------------------------------------
// Position breakdown
// ---------------------------------------------------------------------------

function buildPositionBreakdown(
  definition: PortfolioDefinition,
  latestClose: Map<string, number>,
): { positions: PositionBreakdown[]; totalValue: number; sectorAllocation: Record<string, number> } {
  const rows = definition.allocations.map((allocation) => {
    const position = definition.positions.find((p) => p.ticker === allocation.ticker);
    const shares = position?.shares ?? 0;
    const price = latestClose.get(allocation.ticker) ?? position?.currentPrice ?? 0;
    return {
      ticker: allocation.ticker,
      shares,
      price,
      value: shares * price,
      allocation: allocation.weight,
      sector: position?.sector ?? UNKNOWN_SECTOR,
    };
  });

  const totalValue = rows.reduce((sum, row) => sum + row.value, 0);
  const sectorAllocation: Record<string, number> = {};
  for (const row of rows) {
    sectorAllocation[row.sector] = (sectorAllocation[row.sector] ?? 0) + row.value;
  }

  return {
    positions: rows.map((row) => ({
      ...row,
      weight: totalValue > 0 ? row.value / totalValue : 0,
    })),
    totalValue,
    sectorAllocation,
  };
}

// ---------------------------------------------------------------------------
// Core
// ---------------------------------------------------------------------------

/**
 * Compute the performance report for a portfolio over the trailing window.
 *
 * @throws PortfolioNotFoundError if the portfolio does not exist
 * @throws InsufficientHistoryError if no constituent produced a single return
 */
export async function computePerformance(
  portfolioId: number,
  deps: AnalyticsDeps,
  options: PerformanceOptions = {},
): Promise<PerformanceReport> {
  const { repository, prices, settings } = deps;
  const now = deps.now?.() ?? new Date();
  const definition = await loadPortfolioDefinition(repository, portfolioId);

  if (definition.allocations.length === 0) {
    throw new InsufficientHistoryError(
      `Portfolio ${definition.portfolio.name} has no stocks`,
    );
  }

  const window = lookbackWindow(options.lookbackDays ?? settings.lookbackDays, now);

  const [histories, benchmarkHistory] = await Promise.all([
    Promise.allSettled(
      definition.allocations.map((a) =>
        prices.getPriceHistory(a.ticker, window.start, window.end),
      ),
    ),
    prices
      .getPriceHistory(settings.benchmarkTicker, window.start, window.end)
      .then(
        (bars): { bars: PriceBar[] } | { error: string } => ({ bars }),
        (err: unknown) => ({ error: errorMessage(err) }),
      ),
  ]);

  const constituents: WeightedHistory[] = [];
  const missingTickers: string[] = [];
  const latestClose = new Map<string, number>();

  histories.forEach((result, i) => {
    const allocation = definition.allocations[i];
    if (result.status === "fulfilled") {
      const bars = result.value;
      constituents.push({ ticker: allocation.ticker, weight: allocation.weight, bars });
      const last = bars[bars.length - 1];
      if (last) latestClose.set(allocation.ticker, last.close);
    } else {
      missingTickers.push(allocation.ticker);
      console.warn(
        `[Performance] ${allocation.ticker} unavailable for portfolio ${portfolioId}: ${errorMessage(result.reason)}`,
      );
    }
  });

  const dailyReturns = aggregateWeightedReturns(constituents);
  if (dailyReturns.length === 0) {
    throw new InsufficientHistoryError(
      `No return history for portfolio ${definition.portfolio.name}` +
        (missingTickers.length > 0 ? ` (missing: ${missingTickers.join(", ")})` : ""),
    );
  }

  // Benchmark: degrade, never abort
  let benchmarkReturns: ReturnSeries | null = null;
  let benchmark: BenchmarkStatus;
  if ("bars" in benchmarkHistory) {
    const series = computeDailyReturns(benchmarkHistory.bars);
    const overlap = alignSeries(dailyReturns, series).dates.length;
    if (overlap >= MIN_OBSERVATIONS_FOR_VARIANCE) {
      benchmarkReturns = series;
      benchmark = { ticker: settings.benchmarkTicker, status: "computed", overlap };
    } else {
      benchmark = {
        ticker: settings.benchmarkTicker,
        status: "unavailable",
        overlap,
        error: `only ${overlap} shared dates with benchmark`,
      };
    }
  } else {
    console.warn(
      `[Performance] Benchmark ${settings.benchmarkTicker} unavailable, beta/alpha/tracking error set to 0: ${benchmarkHistory.error}`,
    );
    benchmark = {
      ticker: settings.benchmarkTicker,
      status: "unavailable",
      overlap: 0,
      error: benchmarkHistory.error,
    };
  }

  const metrics = calculatePerformanceMetrics(dailyReturns, benchmarkReturns, settings);
  const riskMetrics = calculateRiskMetrics(dailyReturns, benchmarkReturns);
  const breakdown = buildPositionBreakdown(definition, latestClose);

  return {
    portfolioId: definition.portfolio.id,
    portfolioName: definition.portfolio.name,
    computedAt: now.toISOString(),
    window: { start: toIsoDate(window.start), end: toIsoDate(window.end) },
    totalValue: breakdown.totalValue,
    positions: breakdown.positions,
    sectorAllocation: breakdown.sectorAllocation,
    dailyReturns,
    observations: dailyReturns.length,
    metrics,
    riskMetrics,
    availability: {
      beta: benchmark.status,
      alpha: benchmark.status,
      trackingError: benchmark.status,
    },
    benchmark,
    missingTickers,
  };
}
