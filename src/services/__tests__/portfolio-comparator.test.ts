import { describe, it, expect, beforeEach } from "vitest";
import { InsufficientDataError } from "../../lib/errors.ts";
import {
  buildCorrelationMatrix,
  buildCumulativeCurve,
  comparePortfolios,
} from "../portfolio-comparator.ts";
import type { AnalyticsDeps } from "../portfolio-performance.ts";
import { createPriceSeriesStore } from "../price-store.ts";
import {
  NOW,
  TEST_SETTINGS,
  createFakeProvider,
  createInMemoryRepository,
  makeBars,
  makePosition,
} from "./fixtures.ts";
import type { InMemoryRepository } from "./fixtures.ts";

describe("Portfolio Comparator", () => {
  describe("buildCorrelationMatrix", () => {
    it("has a unit diagonal and is symmetric", () => {
      const a = [
        { date: "2024-01-02", value: 0.01 },
        { date: "2024-01-03", value: 0.02 },
        { date: "2024-01-04", value: -0.01 },
      ];
      const b = a.map((p) => ({ ...p, value: -p.value }));

      const matrix = buildCorrelationMatrix([a, b]);

      expect(matrix[0][0]).toBe(1);
      expect(matrix[1][1]).toBe(1);
      expect(matrix[0][1]).toBeCloseTo(-1, 12);
      expect(matrix[1][0]).toBe(matrix[0][1]);
    });

    it("correlates each pair on its shared dates", () => {
      const a = [
        { date: "2024-01-01", value: 0.5 },
        { date: "2024-01-02", value: 0.01 },
        { date: "2024-01-03", value: 0.02 },
      ];
      const b = [
        { date: "2024-01-02", value: 0.02 },
        { date: "2024-01-03", value: 0.04 },
      ];
      expect(buildCorrelationMatrix([a, b])[0][1]).toBeCloseTo(1, 12);
    });
  });

  it("buildCumulativeCurve starts at the first observation", () => {
    const curve = buildCumulativeCurve([
      { date: "2024-01-02", value: 0.1 },
      { date: "2024-01-03", value: -0.1 },
    ]);
    expect(curve[0]).toEqual({ date: "2024-01-02", value: 1.1 });
    expect(curve[1].date).toBe("2024-01-03");
    expect(curve[1].value).toBeCloseTo(0.99, 12);
  });

  describe("comparePortfolios", () => {
    let repo: InMemoryRepository;
    let deps: AnalyticsDeps;
    let growthId: number;
    let incomeId: number;

    beforeEach(async () => {
      repo = createInMemoryRepository();
      const provider = createFakeProvider({
        AAA: makeBars([100, 102, 101, 104, 103], "2024-02-20"),
        BBB: makeBars([50, 49, 51, 50, 52], "2024-02-20"),
        SPY: makeBars([400, 402, 401, 405, 404], "2024-02-20"),
      });
      const prices = createPriceSeriesStore({
        provider,
        repository: repo,
        cacheTtlHours: 12,
        fetchTimeoutMs: 1000,
        now: () => NOW,
      });
      deps = { repository: repo, prices, settings: TEST_SETTINGS, now: () => NOW };

      await repo.savePosition(makePosition({ ticker: "AAA" }));
      await repo.savePosition(makePosition({ ticker: "BBB" }));
      growthId = (await repo.createPortfolio("Growth", "")).id;
      incomeId = (await repo.createPortfolio("Income", "")).id;
      await repo.upsertAllocations(growthId, { AAA: 1 });
      await repo.upsertAllocations(incomeId, { BBB: 1 });
    });

    it("returns one row per portfolio with a correlation matrix", async () => {
      const report = await comparePortfolios([growthId, incomeId], deps);

      expect(report.portfolios.map((p) => p.portfolioName)).toEqual(["Growth", "Income"]);
      expect(report.correlationMatrix.labels).toEqual(["Growth", "Income"]);
      expect(report.correlationMatrix.values).toHaveLength(2);
      expect(report.correlationMatrix.values[0][0]).toBe(1);
      expect(Object.keys(report.cumulativeReturns)).toEqual(["Growth", "Income"]);
      expect(report.cumulativeReturns.Growth).toHaveLength(4);
      expect(report.skipped).toEqual([]);
    });

    it("correlates identical portfolios at 1", async () => {
      const mirrorId = (await repo.createPortfolio("Mirror", "")).id;
      await repo.upsertAllocations(mirrorId, { AAA: 1 });

      const report = await comparePortfolios([growthId, mirrorId], deps);

      expect(report.correlationMatrix.values[0][1]).toBeCloseTo(1, 12);
    });

    it("skips portfolios that cannot be analysed", async () => {
      const emptyId = (await repo.createPortfolio("Empty", "")).id;

      const report = await comparePortfolios([growthId, incomeId, emptyId], deps);

      expect(report.portfolios).toHaveLength(2);
      expect(report.skipped).toEqual([
        { portfolioId: emptyId, reason: "Portfolio Empty has no stocks" },
      ]);
    });

    it("refuses a comparison with only one usable portfolio", async () => {
      const emptyId = (await repo.createPortfolio("Empty", "")).id;

      const error = await comparePortfolios([growthId, emptyId], deps).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InsufficientDataError);
      expect(error).toMatchObject({
        message: "Need at least 2 portfolios with usable data, got 1",
        details: { skipped: [{ portfolioId: emptyId, reason: "Portfolio Empty has no stocks" }] },
      });
    });

    it("counts repeated ids once", async () => {
      await expect(comparePortfolios([growthId, growthId], deps)).rejects.toBeInstanceOf(
        InsufficientDataError,
      );
    });
  });
});
