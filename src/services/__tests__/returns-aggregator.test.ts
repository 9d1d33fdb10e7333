import { describe, it, expect } from "vitest";
import {
  aggregateWeightedReturns,
  alignSeries,
  computeDailyReturns,
  seriesValues,
} from "../returns-aggregator.ts";
import { makeBars } from "./fixtures.ts";

describe("Returns Aggregator", () => {
  describe("computeDailyReturns", () => {
    it("produces one simple return per bar after the first", () => {
      const series = computeDailyReturns(makeBars([100, 110, 99]));

      expect(series.map((p) => p.date)).toEqual(["2024-01-02", "2024-01-03"]);
      expect(series[0].value).toBeCloseTo(0.1, 12);
      expect(series[1].value).toBeCloseTo(-0.1, 12);
    });

    it("returns an empty series for fewer than two bars", () => {
      expect(computeDailyReturns(makeBars([100]))).toEqual([]);
      expect(computeDailyReturns([])).toEqual([]);
    });

    it("treats a zero previous close as a 0 return", () => {
      const series = computeDailyReturns(makeBars([0, 10]));
      expect(series).toEqual([{ date: "2024-01-02", value: 0 }]);
    });
  });

  describe("aggregateWeightedReturns", () => {
    it("sums weighted returns over the union of dates", () => {
      const series = aggregateWeightedReturns([
        { ticker: "AAA", weight: 0.6, bars: makeBars([100, 110, 121]) },
        { ticker: "BBB", weight: 0.4, bars: makeBars([50, 55], "2024-01-02") },
      ]);

      expect(series.map((p) => p.date)).toEqual(["2024-01-02", "2024-01-03"]);
      // BBB has no return on 01-02 and contributes nothing there
      expect(series[0].value).toBeCloseTo(0.06, 12);
      expect(series[1].value).toBeCloseTo(0.1, 12);
    });

    it("keeps dates ascending regardless of constituent order", () => {
      const series = aggregateWeightedReturns([
        { ticker: "LATE", weight: 0.5, bars: makeBars([10, 11], "2024-02-01") },
        { ticker: "EARLY", weight: 0.5, bars: makeBars([10, 11], "2024-01-01") },
      ]);

      expect(series.map((p) => p.date)).toEqual(["2024-01-02", "2024-02-02"]);
    });

    it("returns an empty series when no constituent has two bars", () => {
      expect(
        aggregateWeightedReturns([{ ticker: "AAA", weight: 1, bars: makeBars([100]) }]),
      ).toEqual([]);
    });
  });

  describe("alignSeries", () => {
    it("keeps only shared dates, index-aligned", () => {
      const aligned = alignSeries(
        [
          { date: "2024-01-02", value: 1 },
          { date: "2024-01-03", value: 2 },
          { date: "2024-01-04", value: 3 },
        ],
        [
          { date: "2024-01-03", value: 20 },
          { date: "2024-01-04", value: 30 },
          { date: "2024-01-05", value: 40 },
        ],
      );

      expect(aligned).toEqual({
        dates: ["2024-01-03", "2024-01-04"],
        left: [2, 3],
        right: [20, 30],
      });
    });
  });

  it("seriesValues strips dates", () => {
    expect(seriesValues([{ date: "2024-01-02", value: 0.5 }])).toEqual([0.5]);
  });
});
