import { Hono } from "hono";
import {
  positionSchema,
  updateSharesSchema,
  validateBody,
} from "../middleware/validation.ts";
import type { PortfolioManager } from "../services/portfolio-manager.ts";

export interface PositionRouteDeps {
  manager: PortfolioManager;
}

export function createPositionRoutes({ manager }: PositionRouteDeps) {
  const positionRoutes = new Hono();

  // ---------------------------------------------------------------------------
  // GET / -- List tracked positions
  // ---------------------------------------------------------------------------

  positionRoutes.get("/", async (c) => {
    const positions = await manager.listPositions();
    return c.json({ positions });
  });

  // ---------------------------------------------------------------------------
  // GET /summary -- Share counts, prices and sectors
  // ---------------------------------------------------------------------------

  positionRoutes.get("/summary", async (c) => {
    return c.json(await manager.getPortfolioSummary());
  });

  // ---------------------------------------------------------------------------
  // POST / -- Track a ticker
  // ---------------------------------------------------------------------------

  positionRoutes.post("/", validateBody(positionSchema), async (c) => {
    const body = c.get("validatedBody");
    const position = await manager.addPosition(body.ticker, body.shares);
    return c.json({ position }, 201);
  });

  // ---------------------------------------------------------------------------
  // POST /refresh -- Re-fetch price history for every position
  // ---------------------------------------------------------------------------

  positionRoutes.post("/refresh", async (c) => {
    return c.json(await manager.refreshPriceData());
  });

  // ---------------------------------------------------------------------------
  // PATCH /:ticker -- Update share count
  // ---------------------------------------------------------------------------

  positionRoutes.patch("/:ticker", validateBody(updateSharesSchema), async (c) => {
    const body = c.get("validatedBody");
    const position = await manager.updateShares(c.req.param("ticker"), body.shares);
    return c.json({ position });
  });

  // ---------------------------------------------------------------------------
  // DELETE /:ticker -- Stop tracking a ticker
  // ---------------------------------------------------------------------------

  positionRoutes.delete("/:ticker", async (c) => {
    const ticker = c.req.param("ticker").toUpperCase();
    await manager.removePosition(ticker);
    return c.json({ deleted: true, ticker });
  });

  return positionRoutes;
}
