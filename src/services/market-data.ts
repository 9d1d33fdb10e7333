/**
 * Alpha Vantage Market Data Provider
 *
 * Fetches daily OHLCV history and company overview (name, sector, market
 * cap) for US equities. Every failure mode (missing key, HTTP error, quota
 * note, unknown symbol, empty series) surfaces as DataUnavailableError so
 * callers can decide whether to degrade or propagate.
 */

import { z } from "zod";
import { DataUnavailableError, errorMessage } from "../lib/errors.ts";
import type { PriceBar } from "./types.ts";

// ---------------------------------------------------------------------------
// Provider contract
// ---------------------------------------------------------------------------

export interface CompanyOverview {
  ticker: string;
  name: string;
  sector: string;
  marketCap: number | null;
}

export interface MarketDataProvider {
  /** Full daily history, ascending by date */
  getDailyHistory(ticker: string): Promise<PriceBar[]>;
  getCompanyOverview(ticker: string): Promise<CompanyOverview>;
}

// ---------------------------------------------------------------------------
// Alpha Vantage API Types
// ---------------------------------------------------------------------------

const dailyBarSchema = z.object({
  "1. open": z.coerce.number(),
  "2. high": z.coerce.number(),
  "3. low": z.coerce.number(),
  "4. close": z.coerce.number(),
  "5. volume": z.coerce.number(),
});

const dailySeriesSchema = z.object({
  "Time Series (Daily)": z.record(z.string(), dailyBarSchema),
});

const overviewSchema = z.object({
  Symbol: z.string(),
  Name: z.string().optional(),
  Sector: z.string().optional(),
  MarketCapitalization: z.string().optional(),
});

/** Keys Alpha Vantage uses to report errors in a 200 response */
const NOTICE_KEYS = ["Error Message", "Note", "Information"] as const;

// ---------------------------------------------------------------------------
// Configuration Constants
// ---------------------------------------------------------------------------

const ALPHA_VANTAGE_BASE_URL = "https://www.alphavantage.co/query";

/** Sector label stored when the provider reports none */
export const UNKNOWN_SECTOR = "Unknown";

export interface AlphaVantageOptions {
  apiKey: string | undefined;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  baseUrl?: string;
}

// ---------------------------------------------------------------------------
// Alpha Vantage API
// ---------------------------------------------------------------------------

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\b\w/g, (ch) => ch.toUpperCase());
}

function parseOptionalNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function createAlphaVantageProvider(
  options: AlphaVantageOptions,
): MarketDataProvider {
  const baseUrl = options.baseUrl ?? ALPHA_VANTAGE_BASE_URL;

  async function query(
    ticker: string,
    params: Record<string, string>,
  ): Promise<Record<string, unknown>> {
    if (!options.apiKey) {
      throw new DataUnavailableError(ticker, "ALPHA_VANTAGE_API_KEY not set");
    }

    const url = new URL(baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("symbol", ticker);
    url.searchParams.set("apikey", options.apiKey);

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      throw new DataUnavailableError(ticker, `request failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      throw new DataUnavailableError(ticker, `HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new DataUnavailableError(ticker, "invalid JSON response");
    }
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
      throw new DataUnavailableError(ticker, "unexpected response shape");
    }

    const data = Object.fromEntries(Object.entries(body));
    for (const key of NOTICE_KEYS) {
      const notice = data[key];
      if (typeof notice === "string") {
        throw new DataUnavailableError(ticker, notice);
      }
    }
    return data;
  }

  return {
    async getDailyHistory(ticker) {
      const data = await query(ticker, {
        function: "TIME_SERIES_DAILY",
        outputsize: "full",
      });

      const parsed = dailySeriesSchema.safeParse(data);
      if (!parsed.success) {
        throw new DataUnavailableError(ticker, "no daily time series in response");
      }

      const bars: PriceBar[] = Object.entries(parsed.data["Time Series (Daily)"])
        .map(([date, bar]) => ({
          date,
          open: bar["1. open"],
          high: bar["2. high"],
          low: bar["3. low"],
          close: bar["4. close"],
          volume: bar["5. volume"],
        }))
        .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

      if (bars.length === 0) {
        throw new DataUnavailableError(ticker, "empty daily time series");
      }

      console.log(`[AlphaVantage] Fetched ${bars.length} daily bars for ${ticker}`);
      return bars;
    },

    async getCompanyOverview(ticker) {
      const data = await query(ticker, { function: "OVERVIEW" });

      // Unknown symbols come back as {}
      const parsed = overviewSchema.safeParse(data);
      if (!parsed.success) {
        throw new DataUnavailableError(ticker, "unknown symbol");
      }

      const overview = parsed.data;
      const sector =
        overview.Sector && overview.Sector !== "None"
          ? titleCase(overview.Sector)
          : UNKNOWN_SECTOR;

      return {
        ticker: overview.Symbol,
        name: overview.Name ?? overview.Symbol,
        sector,
        marketCap: parseOptionalNumber(overview.MarketCapitalization),
      };
    },
  };
}
