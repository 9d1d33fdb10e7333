import { describe, it, expect } from "vitest";
import { createTestContext, jsonRequest, makeBars } from "../services/__tests__/fixtures.ts";

describe("Ratio Routes", () => {
  const histories = {
    AAA: makeBars([10, 20, 30], "2024-02-27"),
    BBB: makeBars([5, 10, 10], "2024-02-27"),
    LATER: makeBars([1, 2], "2024-02-29"),
    EARLY: makeBars([1, 2], "2024-02-10"),
  };

  it("GET / returns the ratio series", async () => {
    const { app } = createTestContext({ histories });

    const res = await app.request("/api/v1/ratios?a=aaa&b=BBB&days=30");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      tickerA: "AAA",
      tickerB: "BBB",
      window: { start: "2024-01-31", end: "2024-03-01" },
      movingAverageWindow: 20,
      currentRatio: 3,
      points: [
        { date: "2024-02-27", ratio: 2, movingAverage: null },
        { date: "2024-02-28", ratio: 2, movingAverage: null },
        { date: "2024-02-29", ratio: 3, movingAverage: null },
      ],
    });
  });

  it("returns 422 when the two histories never overlap", async () => {
    const { app } = createTestContext({ histories });

    const res = await app.request("/api/v1/ratios?a=EARLY&b=LATER");

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "No overlapping data between EARLY and LATER",
      code: "no_overlap",
      status: 422,
    });
  });

  it("returns 502 when a ticker has no data", async () => {
    const { app } = createTestContext({ histories });

    const res = await app.request("/api/v1/ratios?a=AAA&b=ZZZ");

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ code: "data_unavailable" });
  });

  it("serves a ticker again after it was tracked and then removed", async () => {
    const { app } = createTestContext({
      histories,
      overviews: { AAA: { name: "Triple A Corp", sector: "Technology", marketCap: null } },
    });

    expect((await app.request("/api/v1/ratios?a=AAA&b=BBB&days=30")).status).toBe(200);
    expect(
      (await app.request("/api/v1/positions", jsonRequest("POST", { ticker: "AAA", shares: 1 }))).status,
    ).toBe(201);
    expect((await app.request("/api/v1/positions/AAA", { method: "DELETE" })).status).toBe(200);

    const res = await app.request("/api/v1/ratios?a=AAA&b=BBB&days=30");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ currentRatio: 3 });
  });

  it("requires both tickers", async () => {
    const { app } = createTestContext({ histories });

    const res = await app.request("/api/v1/ratios?a=AAA");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: "VALIDATION_FAILED",
      details: { issues: [{ path: "b" }] },
    });
  });
});
