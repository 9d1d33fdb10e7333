import { Hono } from "hono";
import { ratioQuerySchema, validateQuery } from "../middleware/validation.ts";
import type { AnalyticsDeps } from "../services/portfolio-performance.ts";
import { computeTradeRatio } from "../services/trade-ratio.ts";

export interface RatioRouteDeps {
  analytics: Pick<AnalyticsDeps, "prices" | "settings" | "now">;
}

/**
 * GET /?a=AAPL&b=MSFT&days=365 -- closeA / closeB with its 20-period
 * moving average
 */
export function createRatioRoutes({ analytics }: RatioRouteDeps) {
  const ratioRoutes = new Hono();

  ratioRoutes.get("/", validateQuery(ratioQuerySchema), async (c) => {
    const query = c.get("validatedQuery");
    const series = await computeTradeRatio(query.a, query.b, analytics, {
      lookbackDays: query.days,
    });
    return c.json(series);
  });

  return ratioRoutes;
}
