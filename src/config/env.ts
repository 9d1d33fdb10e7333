import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().default(""),
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Alpha Vantage for daily price history + company overview
  ALPHA_VANTAGE_API_KEY: z.string().optional(),

  // Benchmark used for beta / alpha / tracking error
  BENCHMARK_TICKER: z.string().default("SPY"),

  // CAPM inputs for alpha (annual, fractional)
  RISK_FREE_RATE: z.coerce.number().default(0.05),
  ASSUMED_MARKET_RETURN: z.coerce.number().default(0.1),

  DEFAULT_LOOKBACK_DAYS: z.coerce.number().int().positive().default(365),
  PRICE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PRICE_CACHE_TTL_HOURS: z.coerce.number().positive().default(12),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}

export const env = loadEnv();
