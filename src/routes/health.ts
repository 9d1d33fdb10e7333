import { Hono } from "hono";
import { errorMessage } from "../lib/errors.ts";

/** Resolves when the database answers, rejects otherwise */
export type DatabaseCheck = () => Promise<void>;

/**
 * GET /health - System health check with DB connection verification
 *
 * Returns:
 * - status: "ok" or "degraded"
 * - uptime: milliseconds since the routes were created
 * - database: { connected: boolean, latency?: number, error?: string }
 * - timestamp: current ISO timestamp
 */
export function createHealthRoutes(checkDatabase: DatabaseCheck) {
  const healthRoutes = new Hono();

  /** Track server start time for uptime calculation */
  const serverStartTime = Date.now();

  healthRoutes.get("/", async (c) => {
    let dbConnected = false;
    let dbLatency: number | undefined;
    let dbError: string | undefined;

    try {
      const dbCheckStart = Date.now();
      await checkDatabase();
      dbLatency = Date.now() - dbCheckStart;
      dbConnected = true;
    } catch (err) {
      dbError = errorMessage(err);
    }

    const uptime = Date.now() - serverStartTime;
    const status = dbConnected ? "ok" : "degraded";

    return c.json({
      status,
      uptime,
      database: {
        connected: dbConnected,
        ...(dbLatency !== undefined && { latency: dbLatency }),
        ...(dbError && { error: dbError }),
      },
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
