import {
  pgTable,
  text,
  numeric,
  bigint,
  date,
  primaryKey,
} from "drizzle-orm/pg-core";

/**
 * Cached daily OHLCV bars. Append/replace only; the analytics engine reads
 * these as immutable input.
 */
export const historicalData = pgTable(
  "historical_data",
  {
    ticker: text("ticker").notNull(),

    /** Trading day (YYYY-MM-DD) */
    date: date("date", { mode: "string" }).notNull(),

    open: numeric("open", { precision: 20, scale: 6 }).notNull(),
    high: numeric("high", { precision: 20, scale: 6 }).notNull(),
    low: numeric("low", { precision: 20, scale: 6 }).notNull(),
    close: numeric("close", { precision: 20, scale: 6 }).notNull(),
    volume: bigint("volume", { mode: "number" }).notNull(),
  },
  (table) => [
    /** One bar per ticker per day */
    primaryKey({ columns: [table.ticker, table.date] }),
  ],
);
