/**
 * Portfolio Store
 *
 * Persistence for portfolio definitions, per-ticker positions, allocation
 * weights and cached daily price bars. The analytics engine only ever sees
 * the immutable snapshots this store returns.
 *
 * `createDrizzlePortfolioRepository` is the PostgreSQL implementation.
 * Tests substitute an in-memory implementation of the same interface.
 */

import { and, asc, eq, gte, inArray, lte, sql } from "drizzle-orm";
import type { InferSelectModel } from "drizzle-orm";
import type { Database } from "../db/index.ts";
import {
  historicalData,
  portfolioStocks,
  portfolios,
  stocks,
} from "../db/schema/index.ts";
import { PortfolioExistsError } from "../lib/errors.ts";
import type {
  Portfolio,
  PortfolioAllocation,
  PortfolioDefinition,
  PortfolioWithAllocations,
  Position,
  PriceBar,
} from "./types.ts";

type StockRow = InferSelectModel<typeof stocks>;
type AllocationRow = InferSelectModel<typeof portfolioStocks>;
type PortfolioRow = InferSelectModel<typeof portfolios>;
type BarRow = InferSelectModel<typeof historicalData>;

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface PortfolioRepository {
  /** @throws PortfolioExistsError when the name is taken */
  createPortfolio(name: string, description: string): Promise<Portfolio>;
  deletePortfolio(portfolioId: number): Promise<boolean>;
  listPortfolios(): Promise<PortfolioWithAllocations[]>;
  /** Snapshot of one portfolio, or null if it does not exist */
  findPortfolio(portfolioId: number): Promise<PortfolioDefinition | null>;

  /** Insert-or-replace each ticker's weight in a single transaction */
  upsertAllocations(portfolioId: number, weights: Record<string, number>): Promise<void>;
  removeAllocation(portfolioId: number, ticker: string): Promise<boolean>;

  listPositions(): Promise<Position[]>;
  findPosition(ticker: string): Promise<Position | null>;
  /** Insert-or-replace */
  savePosition(position: Position): Promise<void>;
  updateShares(ticker: string, shares: number): Promise<boolean>;
  /** Removes the position and its cached price bars */
  deletePosition(ticker: string): Promise<boolean>;
  markPricesRefreshed(ticker: string, at: Date, currentPrice: number): Promise<void>;

  /** Bars with start <= date <= end (YYYY-MM-DD), ascending */
  loadPriceBars(ticker: string, start: string, end: string): Promise<PriceBar[]>;
  /** Insert-or-replace by (ticker, date) */
  savePriceBars(ticker: string, bars: readonly PriceBar[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toPortfolio(row: PortfolioRow): Portfolio {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.createdAt,
  };
}

function toPosition(row: StockRow): Position {
  return {
    ticker: row.ticker,
    shares: parseFloat(row.shares),
    sector: row.sector,
    currentPrice: parseFloat(row.currentPrice),
    name: row.name,
    marketCap: row.marketCap !== null ? parseFloat(row.marketCap) : null,
    lastUpdated: row.lastUpdated,
  };
}

function toAllocation(row: AllocationRow): PortfolioAllocation {
  return {
    portfolioId: row.portfolioId,
    ticker: row.ticker,
    weight: parseFloat(row.allocation),
  };
}

function toPriceBar(row: BarRow): PriceBar {
  return {
    date: row.date,
    open: parseFloat(row.open),
    high: parseFloat(row.high),
    low: parseFloat(row.low),
    close: parseFloat(row.close),
    volume: row.volume,
  };
}

/** Max rows per multi-row insert (keeps bind parameters well under pg's 65535) */
const PRICE_BAR_INSERT_CHUNK = 1000;

// ---------------------------------------------------------------------------
// Drizzle implementation
// ---------------------------------------------------------------------------

export function createDrizzlePortfolioRepository(db: Database): PortfolioRepository {
  return {
    async createPortfolio(name, description) {
      const inserted = await db
        .insert(portfolios)
        .values({ name, description })
        .onConflictDoNothing({ target: portfolios.name })
        .returning();

      if (inserted.length === 0) {
        throw new PortfolioExistsError(name);
      }
      return toPortfolio(inserted[0]);
    },

    async deletePortfolio(portfolioId) {
      const deleted = await db
        .delete(portfolios)
        .where(eq(portfolios.id, portfolioId))
        .returning({ id: portfolios.id });
      return deleted.length > 0;
    },

    async listPortfolios() {
      const rows = await db.select().from(portfolios).orderBy(asc(portfolios.id));
      const allocationRows = await db.select().from(portfolioStocks);

      return rows.map((row) => ({
        ...toPortfolio(row),
        allocations: allocationRows
          .filter((a) => a.portfolioId === row.id)
          .map(toAllocation),
      }));
    },

    async findPortfolio(portfolioId) {
      // One transaction so allocations and positions come from the same snapshot
      return db.transaction(async (tx) => {
        const [row] = await tx
          .select()
          .from(portfolios)
          .where(eq(portfolios.id, portfolioId));
        if (!row) return null;

        const allocationRows = await tx
          .select()
          .from(portfolioStocks)
          .where(eq(portfolioStocks.portfolioId, portfolioId))
          .orderBy(asc(portfolioStocks.ticker));

        const tickers = allocationRows.map((a) => a.ticker);
        const positionRows =
          tickers.length > 0
            ? await tx.select().from(stocks).where(inArray(stocks.ticker, tickers))
            : [];

        return {
          portfolio: toPortfolio(row),
          allocations: allocationRows.map(toAllocation),
          positions: positionRows.map(toPosition),
        };
      });
    },

    async upsertAllocations(portfolioId, weights) {
      await db.transaction(async (tx) => {
        for (const [ticker, weight] of Object.entries(weights)) {
          await tx
            .insert(portfolioStocks)
            .values({ portfolioId, ticker, allocation: String(weight) })
            .onConflictDoUpdate({
              target: [portfolioStocks.portfolioId, portfolioStocks.ticker],
              set: { allocation: String(weight) },
            });
        }
      });
    },

    async removeAllocation(portfolioId, ticker) {
      const deleted = await db
        .delete(portfolioStocks)
        .where(
          and(
            eq(portfolioStocks.portfolioId, portfolioId),
            eq(portfolioStocks.ticker, ticker),
          ),
        )
        .returning({ ticker: portfolioStocks.ticker });
      return deleted.length > 0;
    },

    async listPositions() {
      const rows = await db.select().from(stocks).orderBy(asc(stocks.ticker));
      return rows.map(toPosition);
    },

    async findPosition(ticker) {
      const [row] = await db.select().from(stocks).where(eq(stocks.ticker, ticker));
      return row ? toPosition(row) : null;
    },

    async savePosition(position) {
      const values = {
        ticker: position.ticker,
        shares: String(position.shares),
        name: position.name,
        sector: position.sector,
        currentPrice: String(position.currentPrice),
        marketCap: position.marketCap !== null ? String(position.marketCap) : null,
        lastUpdated: position.lastUpdated,
      };
      await db
        .insert(stocks)
        .values(values)
        .onConflictDoUpdate({ target: stocks.ticker, set: values });
    },

    async updateShares(ticker, shares) {
      const updated = await db
        .update(stocks)
        .set({ shares: String(shares) })
        .where(eq(stocks.ticker, ticker))
        .returning({ ticker: stocks.ticker });
      return updated.length > 0;
    },

    async deletePosition(ticker) {
      return db.transaction(async (tx) => {
        await tx.delete(historicalData).where(eq(historicalData.ticker, ticker));
        const deleted = await tx
          .delete(stocks)
          .where(eq(stocks.ticker, ticker))
          .returning({ ticker: stocks.ticker });
        return deleted.length > 0;
      });
    },

    async markPricesRefreshed(ticker, at, currentPrice) {
      await db
        .update(stocks)
        .set({ lastUpdated: at, currentPrice: String(currentPrice) })
        .where(eq(stocks.ticker, ticker));
    },

    async loadPriceBars(ticker, start, end) {
      const rows = await db
        .select()
        .from(historicalData)
        .where(
          and(
            eq(historicalData.ticker, ticker),
            gte(historicalData.date, start),
            lte(historicalData.date, end),
          ),
        )
        .orderBy(asc(historicalData.date));
      return rows.map(toPriceBar);
    },

    async savePriceBars(ticker, bars) {
      if (bars.length === 0) return;
      const rows = bars.map((bar) => ({
        ticker,
        date: bar.date,
        open: String(bar.open),
        high: String(bar.high),
        low: String(bar.low),
        close: String(bar.close),
        volume: bar.volume,
      }));

      await db.transaction(async (tx) => {
        for (let i = 0; i < rows.length; i += PRICE_BAR_INSERT_CHUNK) {
          await tx
            .insert(historicalData)
            .values(rows.slice(i, i + PRICE_BAR_INSERT_CHUNK))
            .onConflictDoUpdate({
              target: [historicalData.ticker, historicalData.date],
              set: {
                open: sql`excluded.open`,
                high: sql`excluded.high`,
                low: sql`excluded.low`,
                close: sql`excluded.close`,
                volume: sql`excluded.volume`,
              },
            });
        }
      });
    },
  };
}
