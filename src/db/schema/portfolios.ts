import {
  pgTable,
  text,
  integer,
  numeric,
  timestamp,
  primaryKey,
} from "drizzle-orm/pg-core";
import { stocks } from "./stocks.ts";

export const portfolios = pgTable("portfolios", {
  /** Auto-generated ID */
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

  /** Display name, unique across portfolios */
  name: text("name").notNull().unique(),

  /** Free-form description */
  description: text("description").notNull().default(""),

  /** When the portfolio was created */
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const portfolioStocks = pgTable(
  "portfolio_stocks",
  {
    /** FK to portfolios table (cascade on portfolio delete) */
    portfolioId: integer("portfolio_id")
      .references(() => portfolios.id, { onDelete: "cascade" })
      .notNull(),

    /** FK to stocks table (cascade on position delete) */
    ticker: text("ticker")
      .references(() => stocks.ticker, { onDelete: "cascade" })
      .notNull(),

    /** Allocation weight in [0, 1] */
    allocation: numeric("allocation", { precision: 12, scale: 10 })
      .notNull()
      .default("1.0"),
  },
  (table) => [
    /** One allocation per portfolio per ticker */
    primaryKey({ columns: [table.portfolioId, table.ticker] }),
  ],
);
