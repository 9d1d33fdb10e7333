export * from "./portfolios.ts";
export * from "./stocks.ts";
export * from "./price-history.ts";
