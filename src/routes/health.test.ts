import { describe, it, expect } from "vitest";
import { createHealthRoutes } from "./health.ts";

describe("Health Routes", () => {
  it("reports ok when the database answers", async () => {
    const routes = createHealthRoutes(async () => {});

    const res = await routes.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      database: { connected: true },
    });
  });

  it("reports degraded with the error when the database is down", async () => {
    const routes = createHealthRoutes(async () => {
      throw new Error("connection refused");
    });

    const res = await routes.request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "degraded",
      database: { connected: false, error: "connection refused" },
    });
  });
});
