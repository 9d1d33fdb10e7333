import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestContext,
  jsonRequest,
  makeBars,
  makePosition,
} from "../services/__tests__/fixtures.ts";

const BASE = "/api/v1/positions";

describe("Position Routes", () => {
  let ctx: ReturnType<typeof createTestContext>;

  beforeEach(() => {
    ctx = createTestContext({
      histories: { AAA: makeBars([10, 11, 12], "2024-02-27") },
      overviews: { AAA: { name: "Triple A Corp", sector: "Technology", marketCap: 5000 } },
    });
  });

  it("POST / tracks a ticker and returns its position", async () => {
    const res = await ctx.app.request(BASE, jsonRequest("POST", { ticker: "aaa", shares: 15 }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      position: {
        ticker: "AAA",
        shares: 15,
        sector: "Technology",
        name: "Triple A Corp",
        marketCap: 5000,
        currentPrice: 12,
        lastUpdated: "2024-03-01T00:00:00.000Z",
      },
    });
  });

  it("POST / returns 502 for a ticker the provider does not know", async () => {
    const res = await ctx.app.request(BASE, jsonRequest("POST", { ticker: "ZZZ", shares: 1 }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "No market data for ZZZ: unknown symbol",
      code: "data_unavailable",
      status: 502,
    });
  });

  it("POST / rejects negative shares", async () => {
    const res = await ctx.app.request(BASE, jsonRequest("POST", { ticker: "AAA", shares: -1 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "VALIDATION_FAILED",
      details: { issues: [{ path: "shares", message: "shares must be >= 0" }] },
    });
  });

  it("POST / rejects malformed tickers", async () => {
    const res = await ctx.app.request(BASE, jsonRequest("POST", { ticker: "A A", shares: 1 }));
    expect(res.status).toBe(400);
  });

  it("GET / lists positions and GET /summary summarizes them", async () => {
    await ctx.app.request(BASE, jsonRequest("POST", { ticker: "AAA", shares: 15 }));

    const list = await ctx.app.request(BASE);
    expect(await list.json()).toMatchObject({ positions: [{ ticker: "AAA", shares: 15 }] });

    const summary = await ctx.app.request(`${BASE}/summary`);
    expect(await summary.json()).toEqual({
      totalStocks: 1,
      stocks: [{ ticker: "AAA", shares: 15, currentPrice: 12, marketCap: 5000, sector: "Technology" }],
    });
  });

  it("PATCH /:ticker updates shares", async () => {
    await ctx.app.request(BASE, jsonRequest("POST", { ticker: "AAA", shares: 15 }));

    const res = await ctx.app.request(`${BASE}/aaa`, jsonRequest("PATCH", { shares: 40 }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ position: { ticker: "AAA", shares: 40 } });
  });

  it("PATCH /:ticker returns 404 for an untracked ticker", async () => {
    const res = await ctx.app.request(`${BASE}/ZZZ`, jsonRequest("PATCH", { shares: 1 }));

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "position_not_found" });
  });

  it("DELETE /:ticker stops tracking the ticker", async () => {
    await ctx.app.request(BASE, jsonRequest("POST", { ticker: "AAA", shares: 15 }));

    const res = await ctx.app.request(`${BASE}/aaa`, { method: "DELETE" });

    expect(await res.json()).toEqual({ deleted: true, ticker: "AAA" });
    expect(await ctx.repository.findPosition("AAA")).toBeNull();
  });

  it("POST /refresh reports per-ticker results", async () => {
    await ctx.app.request(BASE, jsonRequest("POST", { ticker: "AAA", shares: 15 }));
    await ctx.repository.savePosition(makePosition({ ticker: "GONE" }));

    const res = await ctx.app.request(`${BASE}/refresh`, { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      refreshed: [{ ticker: "AAA", bars: 3 }],
      failed: [{ ticker: "GONE", error: "No market data for GONE: unknown symbol" }],
    });
  });
});
