/**
 * In-process stand-ins for the Portfolio Store and the market data provider,
 * plus small builders for price bars and positions.
 */

import { createApp } from "../../app.ts";
import { DataUnavailableError, PortfolioExistsError } from "../../lib/errors.ts";
import type { CompanyOverview, MarketDataProvider } from "../market-data.ts";
import { createPortfolioManager } from "../portfolio-manager.ts";
import type { AnalyticsSettings } from "../portfolio-performance.ts";
import type { PortfolioRepository } from "../portfolio-repository.ts";
import { createPriceSeriesStore } from "../price-store.ts";
import type {
  Portfolio,
  PortfolioAllocation,
  Position,
  PriceBar,
} from "../types.ts";

/** Fixed clock used across the analytics tests */
export const NOW = new Date("2024-03-01T00:00:00Z");

export const TEST_SETTINGS: AnalyticsSettings = {
  benchmarkTicker: "SPY",
  lookbackDays: 365,
  riskFreeRate: 0.05,
  marketReturn: 0.1,
};

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * One bar per consecutive calendar day starting at `startDate`, with
 * open/high/low equal to the close.
 */
export function makeBars(closes: readonly number[], startDate = "2024-01-01"): PriceBar[] {
  const start = new Date(`${startDate}T00:00:00Z`).getTime();
  return closes.map((close, i) => ({
    date: new Date(start + i * 86_400_000).toISOString().slice(0, 10),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}

export function makePosition(overrides: Partial<Position> & { ticker: string }): Position {
  return {
    shares: 10,
    sector: "Technology",
    currentPrice: 100,
    name: `${overrides.ticker} Inc`,
    marketCap: null,
    lastUpdated: null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// In-memory Portfolio Store
// ---------------------------------------------------------------------------

export interface InMemoryRepository extends PortfolioRepository {
  /** Raw cached bars by ticker, keyed by date */
  readonly bars: Map<string, Map<string, PriceBar>>;
}

export function createInMemoryRepository(): InMemoryRepository {
  const portfolios = new Map<number, Portfolio>();
  const allocations = new Map<number, Map<string, number>>();
  const positions = new Map<string, Position>();
  const bars = new Map<string, Map<string, PriceBar>>();
  let nextId = 1;

  function allocationsOf(portfolioId: number): PortfolioAllocation[] {
    const weights = allocations.get(portfolioId) ?? new Map<string, number>();
    return [...weights.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([ticker, weight]) => ({ portfolioId, ticker, weight }));
  }

  return {
    bars,

    async createPortfolio(name, description) {
      for (const existing of portfolios.values()) {
        if (existing.name === name) throw new PortfolioExistsError(name);
      }
      const portfolio: Portfolio = { id: nextId++, name, description, createdAt: NOW };
      portfolios.set(portfolio.id, portfolio);
      allocations.set(portfolio.id, new Map());
      return { ...portfolio };
    },

    async deletePortfolio(portfolioId) {
      allocations.delete(portfolioId);
      return portfolios.delete(portfolioId);
    },

    async listPortfolios() {
      return [...portfolios.values()].map((p) => ({ ...p, allocations: allocationsOf(p.id) }));
    },

    async findPortfolio(portfolioId) {
      const portfolio = portfolios.get(portfolioId);
      if (!portfolio) return null;
      const allocs = allocationsOf(portfolioId);
      return {
        portfolio: { ...portfolio },
        allocations: allocs,
        positions: allocs.flatMap((a) => {
          const position = positions.get(a.ticker);
          return position ? [{ ...position }] : [];
        }),
      };
    },

    async upsertAllocations(portfolioId, weights) {
      const current = allocations.get(portfolioId) ?? new Map<string, number>();
      for (const [ticker, weight] of Object.entries(weights)) {
        current.set(ticker, weight);
      }
      allocations.set(portfolioId, current);
    },

    async removeAllocation(portfolioId, ticker) {
      return allocations.get(portfolioId)?.delete(ticker) ?? false;
    },

    async listPositions() {
      return [...positions.values()]
        .sort((a, b) => a.ticker.localeCompare(b.ticker))
        .map((p) => ({ ...p }));
    },

    async findPosition(ticker) {
      const position = positions.get(ticker);
      return position ? { ...position } : null;
    },

    async savePosition(position) {
      positions.set(position.ticker, { ...position });
    },

    async updateShares(ticker, shares) {
      const position = positions.get(ticker);
      if (!position) return false;
      positions.set(ticker, { ...position, shares });
      return true;
    },

    async deletePosition(ticker) {
      bars.delete(ticker);
      for (const weights of allocations.values()) weights.delete(ticker);
      return positions.delete(ticker);
    },

    async markPricesRefreshed(ticker, at, currentPrice) {
      const position = positions.get(ticker);
      if (position) {
        positions.set(ticker, { ...position, lastUpdated: at, currentPrice });
      }
    },

    async loadPriceBars(ticker, start, end) {
      const cached = bars.get(ticker);
      if (!cached) return [];
      return [...cached.values()]
        .filter((bar) => bar.date >= start && bar.date <= end)
        .sort((a, b) => a.date.localeCompare(b.date));
    },

    async savePriceBars(ticker, newBars) {
      const cached = bars.get(ticker) ?? new Map<string, PriceBar>();
      for (const bar of newBars) cached.set(bar.date, { ...bar });
      bars.set(ticker, cached);
    },
  };
}

// ---------------------------------------------------------------------------
// Fake market data provider
// ---------------------------------------------------------------------------

export interface FakeProvider extends MarketDataProvider {
  /** Provider calls made so far, by ticker */
  readonly historyCalls: Map<string, number>;
}

/**
 * Serves the given histories and overviews. Unknown tickers throw
 * DataUnavailableError, as the real provider does.
 */
export function createFakeProvider(
  histories: Record<string, PriceBar[]>,
  overviews: Record<string, Omit<CompanyOverview, "ticker">> = {},
): FakeProvider {
  const historyCalls = new Map<string, number>();

  return {
    historyCalls,

    async getDailyHistory(ticker) {
      historyCalls.set(ticker, (historyCalls.get(ticker) ?? 0) + 1);
      const history = histories[ticker];
      if (!history) throw new DataUnavailableError(ticker, "unknown symbol");
      return history.map((bar) => ({ ...bar }));
    },

    async getCompanyOverview(ticker) {
      const overview = overviews[ticker];
      if (!overview) throw new DataUnavailableError(ticker, "unknown symbol");
      return { ticker, ...overview };
    },
  };
}

// ---------------------------------------------------------------------------
// Wired application
// ---------------------------------------------------------------------------

export interface TestContextOptions {
  histories?: Record<string, PriceBar[]>;
  overviews?: Record<string, Omit<CompanyOverview, "ticker">>;
  checkDatabase?: () => Promise<void>;
}

/**
 * The full HTTP app over the in-memory store and fake provider, with the
 * clock fixed at NOW and rate limiting off.
 */
export function createTestContext(options: TestContextOptions = {}) {
  const repository = createInMemoryRepository();
  const provider = createFakeProvider(options.histories ?? {}, options.overviews ?? {});
  const prices = createPriceSeriesStore({
    provider,
    repository,
    cacheTtlHours: 12,
    fetchTimeoutMs: 1000,
    now: () => NOW,
  });
  const manager = createPortfolioManager({ repository, provider, prices });
  const app = createApp({
    manager,
    analytics: { repository, prices, settings: TEST_SETTINGS, now: () => NOW },
    checkDatabase: options.checkDatabase ?? (async () => {}),
    rateLimit: false,
  });
  return { app, repository, provider, manager };
}

/** JSON request init for app.request() */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}
