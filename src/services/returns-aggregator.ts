/**
 * Returns Aggregator
 *
 * Turns per-instrument close prices into daily simple returns, and combines
 * several instruments into one allocation-weighted portfolio return series.
 *
 * The aggregate is additive with a fill value of 0: on a date where an
 * instrument has no return it contributes nothing, and the date survives as
 * long as at least one constituent traded. Pairwise work (benchmark, ratio,
 * correlation) aligns strictly on the date intersection instead; see
 * {@link alignSeries}.
 */

import type { PriceBar, ReturnSeries, SeriesPoint } from "./types.ts";

export interface WeightedHistory {
  ticker: string;
  weight: number;
  bars: readonly PriceBar[];
}

/**
 * Daily simple returns (close[t] - close[t-1]) / close[t-1].
 * The first bar has no return. A zero previous close yields a 0 return.
 */
export function computeDailyReturns(bars: readonly PriceBar[]): ReturnSeries {
  const series: ReturnSeries = [];
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1].close;
    const curr = bars[i].close;
    series.push({
      date: bars[i].date,
      value: prev !== 0 ? (curr - prev) / prev : 0,
    });
  }
  return series;
}

/**
 * Allocation-weighted daily return series over the union of constituent
 * return dates. Returns [] when no constituent has at least two bars.
 */
export function aggregateWeightedReturns(
  constituents: readonly WeightedHistory[],
): ReturnSeries {
  const totals = new Map<string, number>();

  for (const { weight, bars } of constituents) {
    for (const point of computeDailyReturns(bars)) {
      totals.set(point.date, (totals.get(point.date) ?? 0) + weight * point.value);
    }
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, value]) => ({ date, value }));
}

/**
 * Align two series on their shared dates. Output arrays are index-aligned
 * and ordered by date.
 */
export function alignSeries(
  a: readonly SeriesPoint[],
  b: readonly SeriesPoint[],
): { dates: string[]; left: number[]; right: number[] } {
  const rightByDate = new Map(b.map((p) => [p.date, p.value]));
  const dates: string[] = [];
  const left: number[] = [];
  const right: number[] = [];

  for (const point of a) {
    const other = rightByDate.get(point.date);
    if (other === undefined) continue;
    dates.push(point.date);
    left.push(point.value);
    right.push(other);
  }

  return { dates, left, right };
}

/** Strip dates from a series. */
export function seriesValues(series: readonly SeriesPoint[]): number[] {
  return series.map((p) => p.value);
}
