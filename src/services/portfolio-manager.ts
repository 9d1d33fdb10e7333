/**
 * Portfolio Management
 *
 * Portfolio and position bookkeeping on top of the Portfolio Store: create
 * and delete portfolios, attach tickers with an allocation, track share
 * counts, and refresh cached price history for every tracked ticker.
 */

import { DEFAULT_ALLOCATION_WEIGHT } from "../config/financial-constants.ts";
import {
  PortfolioNotFoundError,
  PositionNotFoundError,
  errorMessage,
} from "../lib/errors.ts";
import type { MarketDataProvider } from "./market-data.ts";
import type { PortfolioRepository } from "./portfolio-repository.ts";
import type { PriceSeriesStore } from "./price-store.ts";
import type {
  Portfolio,
  PortfolioDefinition,
  PortfolioWithAllocations,
  Position,
} from "./types.ts";

export interface PortfolioManagerDeps {
  repository: PortfolioRepository;
  provider: MarketDataProvider;
  prices: PriceSeriesStore;
}

export interface PortfolioSummary {
  totalStocks: number;
  stocks: Array<{
    ticker: string;
    shares: number;
    currentPrice: number;
    marketCap: number;
    sector: string;
  }>;
}

export interface RefreshResult {
  refreshed: Array<{ ticker: string; bars: number }>;
  failed: Array<{ ticker: string; error: string }>;
}

/** Tickers are stored upper-case and trimmed */
export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export function createPortfolioManager(deps: PortfolioManagerDeps) {
  const { repository, provider, prices } = deps;

  async function requirePortfolio(portfolioId: number): Promise<PortfolioDefinition> {
    const definition = await repository.findPortfolio(portfolioId);
    if (!definition) throw new PortfolioNotFoundError(portfolioId);
    return definition;
  }

  /**
   * Track a ticker (or update its shares if already tracked). The provider
   * overview must know the symbol; its history is cached right away so the
   * position has a current price.
   *
   * @throws DataUnavailableError for unknown symbols
   */
  async function addPosition(rawTicker: string, shares: number): Promise<Position> {
    const ticker = normalizeTicker(rawTicker);
    const overview = await provider.getCompanyOverview(ticker);

    const existing = await repository.findPosition(ticker);
    const position: Position = {
      ticker,
      shares,
      sector: overview.sector,
      name: overview.name,
      marketCap: overview.marketCap,
      currentPrice: existing?.currentPrice ?? 0,
      lastUpdated: existing?.lastUpdated ?? null,
    };
    await repository.savePosition(position);

    try {
      await prices.refresh(ticker);
    } catch (err) {
      console.warn(`[Portfolio] Price history for ${ticker} not cached: ${errorMessage(err)}`);
    }

    console.log(`[Portfolio] Tracking ${ticker} (${shares} shares)`);
    return (await repository.findPosition(ticker)) ?? position;
  }

  return {
    async createPortfolio(name: string, description = ""): Promise<Portfolio> {
      const portfolio = await repository.createPortfolio(name.trim(), description);
      console.log(`[Portfolio] Created portfolio ${portfolio.id} (${portfolio.name})`);
      return portfolio;
    },

    async deletePortfolio(portfolioId: number): Promise<void> {
      const deleted = await repository.deletePortfolio(portfolioId);
      if (!deleted) throw new PortfolioNotFoundError(portfolioId);
      console.log(`[Portfolio] Deleted portfolio ${portfolioId}`);
    },

    listPortfolios(): Promise<PortfolioWithAllocations[]> {
      return repository.listPortfolios();
    },

    getPortfolio: requirePortfolio,

    /**
     * Attach a ticker to a portfolio (insert-or-replace its allocation).
     * Untracked tickers are added as a zero-share position first.
     */
    async addTickerToPortfolio(
      portfolioId: number,
      rawTicker: string,
      allocation: number = DEFAULT_ALLOCATION_WEIGHT,
    ): Promise<PortfolioDefinition> {
      const ticker = normalizeTicker(rawTicker);
      await requirePortfolio(portfolioId);

      if (!(await repository.findPosition(ticker))) {
        await addPosition(ticker, 0);
      }
      await repository.upsertAllocations(portfolioId, { [ticker]: allocation });
      return requirePortfolio(portfolioId);
    },

    /** Detach a ticker. Detaching one that is not attached changes nothing. */
    async removeTickerFromPortfolio(
      portfolioId: number,
      rawTicker: string,
    ): Promise<PortfolioDefinition> {
      const ticker = normalizeTicker(rawTicker);
      await requirePortfolio(portfolioId);
      if (await repository.removeAllocation(portfolioId, ticker)) {
        console.log(`[Portfolio] Detached ${ticker} from portfolio ${portfolioId}`);
      }
      return requirePortfolio(portfolioId);
    },

    addPosition,

    async updateShares(rawTicker: string, shares: number): Promise<Position> {
      const ticker = normalizeTicker(rawTicker);
      const updated = await repository.updateShares(ticker, shares);
      const position = updated ? await repository.findPosition(ticker) : null;
      if (!position) throw new PositionNotFoundError(ticker);
      return position;
    },

    async removePosition(rawTicker: string): Promise<void> {
      const ticker = normalizeTicker(rawTicker);
      const deleted = await repository.deletePosition(ticker);
      if (!deleted) throw new PositionNotFoundError(ticker);
      // Its cached bars are gone with it
      prices.invalidate(ticker);
      console.log(`[Portfolio] Stopped tracking ${ticker}`);
    },

    listPositions(): Promise<Position[]> {
      return repository.listPositions();
    },

    async getPortfolioSummary(): Promise<PortfolioSummary> {
      const positions = await repository.listPositions();
      return {
        totalStocks: positions.length,
        stocks: positions.map((p) => ({
          ticker: p.ticker,
          shares: p.shares,
          currentPrice: p.currentPrice,
          marketCap: p.marketCap ?? 0,
          sector: p.sector,
        })),
      };
    },

    /**
     * Re-fetch history for every tracked ticker. One failure does not stop
     * the others.
     */
    async refreshPriceData(): Promise<RefreshResult> {
      const positions = await repository.listPositions();
      const results = await Promise.allSettled(
        positions.map((p) => prices.refresh(p.ticker)),
      );

      const refreshed: RefreshResult["refreshed"] = [];
      const failed: RefreshResult["failed"] = [];
      results.forEach((result, i) => {
        const ticker = positions[i].ticker;
        if (result.status === "fulfilled") {
          refreshed.push({ ticker, bars: result.value });
        } else {
          failed.push({ ticker, error: errorMessage(result.reason) });
        }
      });

      console.log(
        `[Portfolio] Refreshed ${refreshed.length}/${positions.length} tickers` +
          (failed.length > 0 ? ` (failed: ${failed.map((f) => f.ticker).join(", ")})` : ""),
      );
      return { refreshed, failed };
    },
  };
}

export type PortfolioManager = ReturnType<typeof createPortfolioManager>;
