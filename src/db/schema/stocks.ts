import { pgTable, text, numeric, timestamp } from "drizzle-orm/pg-core";

/**
 * Tracked positions, one row per ticker.
 */
export const stocks = pgTable("stocks", {
  /** Exchange ticker (e.g., "AAPL") */
  ticker: text("ticker").primaryKey(),

  /** Shares held (>= 0) */
  shares: numeric("shares", { precision: 20, scale: 6 }).notNull().default("0"),

  /** Company name from the provider overview */
  name: text("name"),

  /** GICS-style sector, "Unknown" when the provider has none */
  sector: text("sector").notNull().default("Unknown"),

  /** Latest known price (USD) */
  currentPrice: numeric("current_price", { precision: 20, scale: 6 })
    .notNull()
    .default("0"),

  /** Market capitalization (USD) */
  marketCap: numeric("market_cap", { precision: 24, scale: 2 }),

  /** When price history was last refreshed from the provider */
  lastUpdated: timestamp("last_updated"),
});
