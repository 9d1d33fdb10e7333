/**
 * Price Series Store
 *
 * Serves daily price history for a window from the historical_data cache and
 * refreshes a ticker from the market data provider when its cache is older
 * than the TTL (or was never filled). Only raw bars are cached; derived
 * reports are always recomputed.
 *
 * Features:
 * - TTL keyed on the position's lastUpdated stamp (tickers that are not
 *   tracked positions, e.g. the benchmark, use an in-process stamp that is
 *   dropped once it expires or the ticker's cache is cleared)
 * - Per-request timeout so one slow ticker cannot stall a portfolio
 * - Concurrent refreshes of the same ticker share one provider call
 */

import { MS_PER_DAY, MS_PER_HOUR } from "../config/financial-constants.ts";
import { DataUnavailableError, errorMessage } from "../lib/errors.ts";
import type { MarketDataProvider } from "./market-data.ts";
import type { PortfolioRepository } from "./portfolio-repository.ts";
import type { DateWindow, PriceBar } from "./types.ts";

export interface PriceSeriesStore {
  /**
   * Ordered bars with start <= date <= end.
   * @throws DataUnavailableError when nothing is known for the ticker/window
   */
  getPriceHistory(ticker: string, start: Date, end: Date): Promise<PriceBar[]>;
  /** Force a provider fetch and cache write; returns the number of bars stored */
  refresh(ticker: string): Promise<number>;
  /** Forget the refresh stamp so the next read goes to the provider */
  invalidate(ticker: string): void;
  /** Drop expired in-process stamps; returns how many were removed */
  cleanExpired(): number;
}

export interface PriceStoreOptions {
  provider: MarketDataProvider;
  repository: PortfolioRepository;
  cacheTtlHours: number;
  /** Upper bound on a single provider fetch */
  fetchTimeoutMs: number;
  now?: () => Date;
}

/** YYYY-MM-DD in UTC */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** [now - days, now] */
export function lookbackWindow(days: number, now: Date = new Date()): DateWindow {
  return { start: new Date(now.getTime() - days * MS_PER_DAY), end: now };
}

/**
 * Reject after `ms` with DataUnavailableError. The underlying promise keeps
 * running; its result is discarded.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  ticker: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DataUnavailableError(ticker, `timed out after ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createPriceSeriesStore(options: PriceStoreOptions): PriceSeriesStore {
  const { provider, repository } = options;
  const now = options.now ?? (() => new Date());
  const ttlMs = options.cacheTtlHours * MS_PER_HOUR;

  // Refresh stamps for tickers that have no row in the stocks table
  const untrackedRefreshedAt = new Map<string, number>();
  const inFlight = new Map<string, Promise<number>>();

  function isExpired(stamp: number): boolean {
    return now().getTime() - stamp > ttlMs;
  }

  function cleanExpired(): number {
    let cleaned = 0;
    for (const [ticker, stamp] of untrackedRefreshedAt) {
      if (isExpired(stamp)) {
        untrackedRefreshedAt.delete(ticker);
        cleaned++;
      }
    }
    if (cleaned > 0) {
      console.log(`[PriceStore] Cleaned ${cleaned} expired refresh stamps`);
    }
    return cleaned;
  }

  async function lastRefreshedAt(ticker: string): Promise<number | null> {
    const position = await repository.findPosition(ticker);
    if (position?.lastUpdated) return position.lastUpdated.getTime();
    return untrackedRefreshedAt.get(ticker) ?? null;
  }

  async function fetchAndCache(ticker: string): Promise<number> {
    const bars = await withTimeout(
      provider.getDailyHistory(ticker),
      options.fetchTimeoutMs,
      ticker,
    );
    await repository.savePriceBars(ticker, bars);

    const refreshedAt = now();
    const last = bars[bars.length - 1];
    const position = await repository.findPosition(ticker);
    if (position && last) {
      await repository.markPricesRefreshed(ticker, refreshedAt, last.close);
      untrackedRefreshedAt.delete(ticker);
    } else {
      cleanExpired();
      untrackedRefreshedAt.set(ticker, refreshedAt.getTime());
    }
    return bars.length;
  }

  function refresh(ticker: string): Promise<number> {
    const pending = inFlight.get(ticker);
    if (pending) return pending;

    const request = fetchAndCache(ticker).finally(() => {
      inFlight.delete(ticker);
    });
    inFlight.set(ticker, request);
    return request;
  }

  return {
    refresh,
    cleanExpired,

    invalidate(ticker) {
      untrackedRefreshedAt.delete(ticker);
    },

    async getPriceHistory(ticker, start, end) {
      const stamp = await lastRefreshedAt(ticker);
      const stale = stamp === null || isExpired(stamp);

      if (stale) {
        try {
          await refresh(ticker);
        } catch (err) {
          // Serve whatever the cache still has; only fail if that is nothing
          console.warn(
            `[PriceStore] Refresh failed for ${ticker}: ${errorMessage(err)}`,
          );
          const cached = await repository.loadPriceBars(ticker, toIsoDate(start), toIsoDate(end));
          if (cached.length === 0) throw err;
          return cached;
        }
      }

      const bars = await repository.loadPriceBars(ticker, toIsoDate(start), toIsoDate(end));
      if (bars.length === 0) {
        throw new DataUnavailableError(
          ticker,
          `no bars between ${toIsoDate(start)} and ${toIsoDate(end)}`,
        );
      }
      return bars;
    },
  };
}
