import { serve } from "@hono/node-server";
import { sql } from "drizzle-orm";
import { createApp } from "./app.ts";
import { env } from "./config/env.ts";
import { db } from "./db/index.ts";
import { createAlphaVantageProvider } from "./services/market-data.ts";
import { createPortfolioManager } from "./services/portfolio-manager.ts";
import type { AnalyticsSettings } from "./services/portfolio-performance.ts";
import { createDrizzlePortfolioRepository } from "./services/portfolio-repository.ts";
import { createPriceSeriesStore } from "./services/price-store.ts";

const repository = createDrizzlePortfolioRepository(db);

const provider = createAlphaVantageProvider({
  apiKey: env.ALPHA_VANTAGE_API_KEY,
  timeoutMs: env.PRICE_FETCH_TIMEOUT_MS,
});

const prices = createPriceSeriesStore({
  provider,
  repository,
  cacheTtlHours: env.PRICE_CACHE_TTL_HOURS,
  fetchTimeoutMs: env.PRICE_FETCH_TIMEOUT_MS,
});

const settings: AnalyticsSettings = {
  benchmarkTicker: env.BENCHMARK_TICKER,
  lookbackDays: env.DEFAULT_LOOKBACK_DAYS,
  riskFreeRate: env.RISK_FREE_RATE,
  marketReturn: env.ASSUMED_MARKET_RETURN,
};

const app = createApp({
  manager: createPortfolioManager({ repository, provider, prices }),
  analytics: { repository, prices, settings },
  checkDatabase: async () => {
    await db.execute(sql`SELECT 1 as health_check`);
  },
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(
      `Stockfolio Analytics API listening on port ${info.port} (benchmark ${settings.benchmarkTicker})`,
    );
  },
);

export default app;
