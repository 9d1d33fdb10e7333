import { describe, it, expect } from "vitest";
import { loadEnv } from "../env.ts";

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv({})).toEqual({
      DATABASE_URL: "",
      PORT: 3000,
      NODE_ENV: "development",
      BENCHMARK_TICKER: "SPY",
      RISK_FREE_RATE: 0.05,
      ASSUMED_MARKET_RETURN: 0.1,
      DEFAULT_LOOKBACK_DAYS: 365,
      PRICE_FETCH_TIMEOUT_MS: 10000,
      PRICE_CACHE_TTL_HOURS: 12,
    });
  });

  it("coerces numeric settings", () => {
    const env = loadEnv({ PORT: "8080", RISK_FREE_RATE: "0.03", BENCHMARK_TICKER: "QQQ" });
    expect(env.PORT).toBe(8080);
    expect(env.RISK_FREE_RATE).toBe(0.03);
    expect(env.BENCHMARK_TICKER).toBe("QQQ");
  });

  it("rejects invalid values", () => {
    expect(() => loadEnv({ NODE_ENV: "staging" })).toThrow(/^Environment validation failed/);
    expect(() => loadEnv({ DEFAULT_LOOKBACK_DAYS: "-5" })).toThrow(/DEFAULT_LOOKBACK_DAYS/);
  });
});
