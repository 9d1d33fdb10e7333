/**
 * Shared analytics types.
 *
 * Everything the engine computes is derived from immutable snapshots of
 * these records; nothing here is mutated after it is loaded.
 */

// ---------------------------------------------------------------------------
// Market data
// ---------------------------------------------------------------------------

/** One daily OHLCV bar. `date` is a calendar day in YYYY-MM-DD form. */
export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** One observation of a daily series (return, ratio, cumulative value). */
export interface SeriesPoint {
  date: string;
  value: number;
}

/** Ordered by date ascending. */
export type ReturnSeries = SeriesPoint[];

export interface DateWindow {
  start: Date;
  end: Date;
}

// ---------------------------------------------------------------------------
// Portfolio records
// ---------------------------------------------------------------------------

export interface Portfolio {
  id: number;
  name: string;
  description: string;
  createdAt: Date;
}

export interface Position {
  ticker: string;
  shares: number;
  sector: string;
  currentPrice: number;
  name: string | null;
  marketCap: number | null;
  lastUpdated: Date | null;
}

export interface PortfolioAllocation {
  portfolioId: number;
  ticker: string;
  weight: number;
}

/** Immutable view of one portfolio, loaded once per computation. */
export interface PortfolioDefinition {
  portfolio: Portfolio;
  allocations: readonly PortfolioAllocation[];
  /** Positions for the allocated tickers that exist in the position table */
  positions: readonly Position[];
}

export interface PortfolioWithAllocations extends Portfolio {
  allocations: PortfolioAllocation[];
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export interface PerformanceMetrics {
  totalReturn: number;
  annualizedReturn: number;
  volatility: number;
  sharpeRatio: number;
  sortinoRatio: number;
  calmarRatio: number;
  maxDrawdown: number;
  beta: number;
  alpha: number;
}

export interface RiskMetrics {
  var95: number;
  var99: number;
  cvar95: number;
  cvar99: number;
  trackingError: number;
}

/**
 * Whether a benchmark-dependent metric was actually computed, or is a
 * neutral 0 because the benchmark could not be used.
 */
export type MetricAvailability = "computed" | "unavailable";

export interface BenchmarkStatus {
  ticker: string;
  status: MetricAvailability;
  /** Shared dates between portfolio and benchmark returns */
  overlap: number;
  error?: string;
}

export interface PositionBreakdown {
  ticker: string;
  shares: number;
  price: number;
  value: number;
  /** Share of total market value (0 when the portfolio is worth nothing) */
  weight: number;
  /** Allocation weight used for the return series */
  allocation: number;
  sector: string;
}

export interface PerformanceReport {
  portfolioId: number;
  portfolioName: string;
  computedAt: string;
  window: { start: string; end: string };
  totalValue: number;
  positions: PositionBreakdown[];
  sectorAllocation: Record<string, number>;
  dailyReturns: ReturnSeries;
  observations: number;
  metrics: PerformanceMetrics;
  riskMetrics: RiskMetrics;
  availability: {
    beta: MetricAvailability;
    alpha: MetricAvailability;
    trackingError: MetricAvailability;
  };
  benchmark: BenchmarkStatus;
  /** Allocated tickers whose history could not be fetched; they contribute 0 */
  missingTickers: string[];
}

export interface ComparisonRow {
  portfolioId: number;
  portfolioName: string;
  totalValue: number;
  observations: number;
  metrics: PerformanceMetrics;
  riskMetrics: RiskMetrics;
}

export interface ComparisonReport {
  computedAt: string;
  portfolios: ComparisonRow[];
  skipped: Array<{ portfolioId: number; reason: string }>;
  correlationMatrix: {
    labels: string[];
    values: number[][];
  };
  cumulativeReturns: Record<string, SeriesPoint[]>;
}

export interface RatioPoint {
  date: string;
  ratio: number;
  movingAverage: number | null;
}

export interface RatioSeries {
  tickerA: string;
  tickerB: string;
  window: { start: string; end: string };
  movingAverageWindow: number;
  currentRatio: number | null;
  points: RatioPoint[];
}
