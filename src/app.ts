import { Hono } from "hono";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { apiRateLimiter } from "./middleware/rate-limit.ts";
import { createHealthRoutes } from "./routes/health.ts";
import type { DatabaseCheck } from "./routes/health.ts";
import { createPortfolioRoutes } from "./routes/portfolios.ts";
import { createPositionRoutes } from "./routes/positions.ts";
import { createRatioRoutes } from "./routes/ratios.ts";
import type { PortfolioManager } from "./services/portfolio-manager.ts";
import type { AnalyticsDeps } from "./services/portfolio-performance.ts";

export interface AppDeps {
  manager: PortfolioManager;
  analytics: AnalyticsDeps;
  checkDatabase: DatabaseCheck;
  /** Disable for in-process tests that fire many requests */
  rateLimit?: boolean;
}

export function createApp(deps: AppDeps) {
  const app = new Hono();

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  if (deps.rateLimit ?? true) {
    app.use("/api/v1/*", apiRateLimiter);
  }

  // Health check
  app.route("/api/v1/health", createHealthRoutes(deps.checkDatabase));

  // Portfolio definitions, allocations and analytics
  app.route(
    "/api/v1/portfolios",
    createPortfolioRoutes({ manager: deps.manager, analytics: deps.analytics }),
  );

  // Tracked positions
  app.route("/api/v1/positions", createPositionRoutes({ manager: deps.manager }));

  // Trade ratios
  app.route("/api/v1/ratios", createRatioRoutes({ analytics: deps.analytics }));

  return app;
}
