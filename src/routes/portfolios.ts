/**
 * Portfolio Routes
 *
 * Portfolio definitions, their ticker allocations, and the analytics built
 * on them.
 *
 * Endpoints:
 * - GET    /                        -- List portfolios with allocations
 * - POST   /                        -- Create a portfolio
 * - GET    /compare?ids=1,2&days=   -- Compare two or more portfolios
 * - GET    /:id                     -- Portfolio, allocations and positions
 * - DELETE /:id                     -- Delete a portfolio
 * - POST   /:id/stocks              -- Attach a ticker with an allocation
 * - DELETE /:id/stocks/:ticker      -- Detach a ticker
 * - PUT    /:id/allocations         -- Validate and commit new weights
 * - GET    /:id/performance?days=   -- Performance and risk report
 */

import { Hono } from "hono";
import { AppError } from "../lib/errors.ts";
import {
  addStockSchema,
  compareQuerySchema,
  createPortfolioSchema,
  lookbackQuerySchema,
  portfolioIdSchema,
  rebalanceSchema,
  validateBody,
  validateQuery,
} from "../middleware/validation.ts";
import { comparePortfolios } from "../services/portfolio-comparator.ts";
import type { PortfolioManager } from "../services/portfolio-manager.ts";
import { computePerformance } from "../services/portfolio-performance.ts";
import type { AnalyticsDeps } from "../services/portfolio-performance.ts";
import { validateAndRebalance } from "../services/rebalancer.ts";

export interface PortfolioRouteDeps {
  manager: PortfolioManager;
  analytics: AnalyticsDeps;
}

function portfolioIdParam(raw: string): number {
  const parsed = portfolioIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError("VALIDATION_FAILED", `Invalid portfolio id: ${raw}`);
  }
  return parsed.data;
}

export function createPortfolioRoutes({ manager, analytics }: PortfolioRouteDeps) {
  const portfolioRoutes = new Hono();

  // -------------------------------------------------------------------------
  // Definitions
  // -------------------------------------------------------------------------

  portfolioRoutes.get("/", async (c) => {
    const portfolios = await manager.listPortfolios();
    return c.json({ portfolios });
  });

  portfolioRoutes.post("/", validateBody(createPortfolioSchema), async (c) => {
    const body = c.get("validatedBody");
    const portfolio = await manager.createPortfolio(body.name, body.description);
    return c.json({ portfolio }, 201);
  });

  // Registered before /:id so "compare" is not read as an id
  portfolioRoutes.get("/compare", validateQuery(compareQuerySchema), async (c) => {
    const query = c.get("validatedQuery");
    const report = await comparePortfolios(query.ids, analytics, {
      lookbackDays: query.days,
    });
    return c.json(report);
  });

  portfolioRoutes.get("/:id", async (c) => {
    const definition = await manager.getPortfolio(portfolioIdParam(c.req.param("id")));
    return c.json(definition);
  });

  portfolioRoutes.delete("/:id", async (c) => {
    const portfolioId = portfolioIdParam(c.req.param("id"));
    await manager.deletePortfolio(portfolioId);
    return c.json({ deleted: true, portfolioId });
  });

  // -------------------------------------------------------------------------
  // Allocations
  // -------------------------------------------------------------------------

  portfolioRoutes.post("/:id/stocks", validateBody(addStockSchema), async (c) => {
    const body = c.get("validatedBody");
    const definition = await manager.addTickerToPortfolio(
      portfolioIdParam(c.req.param("id")),
      body.ticker,
      body.allocation,
    );
    return c.json(definition, 201);
  });

  portfolioRoutes.delete("/:id/stocks/:ticker", async (c) => {
    const definition = await manager.removeTickerFromPortfolio(
      portfolioIdParam(c.req.param("id")),
      c.req.param("ticker"),
    );
    return c.json(definition);
  });

  portfolioRoutes.put("/:id/allocations", validateBody(rebalanceSchema), async (c) => {
    const body = c.get("validatedBody");
    const result = await validateAndRebalance(
      portfolioIdParam(c.req.param("id")),
      body.weights,
      analytics.repository,
    );
    return c.json(result);
  });

  // -------------------------------------------------------------------------
  // Analytics
  // -------------------------------------------------------------------------

  portfolioRoutes.get("/:id/performance", validateQuery(lookbackQuerySchema), async (c) => {
    const query = c.get("validatedQuery");
    const report = await computePerformance(portfolioIdParam(c.req.param("id")), analytics, {
      lookbackDays: query.days,
    });
    return c.json(report);
  });

  return portfolioRoutes;
}
