/**
 * Trade Ratio Calculator
 *
 * Relative price of one instrument in units of another (closeA / closeB)
 * on the dates both traded, with a trailing 20-period simple moving average
 * as the trend line.
 */

import { RATIO_MOVING_AVERAGE_WINDOW } from "../config/financial-constants.ts";
import { NoOverlapError } from "../lib/errors.ts";
import { trailingMean } from "../lib/math-utils.ts";
import type { AnalyticsDeps } from "./portfolio-performance.ts";
import { lookbackWindow, toIsoDate } from "./price-store.ts";
import type { PriceBar, RatioPoint, RatioSeries } from "./types.ts";

export interface TradeRatioOptions {
  lookbackDays?: number;
  movingAverageWindow?: number;
}

/**
 * Ratio points over the date intersection of both histories, ascending.
 * Dates where closeB is 0 are left out.
 *
 * @throws NoOverlapError when the histories share no usable date
 */
export function buildRatioPoints(
  tickerA: string,
  tickerB: string,
  barsA: readonly PriceBar[],
  barsB: readonly PriceBar[],
  movingAverageWindow: number = RATIO_MOVING_AVERAGE_WINDOW,
): RatioPoint[] {
  const closeB = new Map(barsB.map((bar) => [bar.date, bar.close]));

  const aligned: Array<{ date: string; ratio: number }> = [];
  for (const bar of barsA) {
    const b = closeB.get(bar.date);
    if (b === undefined || b === 0) continue;
    aligned.push({ date: bar.date, ratio: bar.close / b });
  }
  aligned.sort((x, y) => (x.date < y.date ? -1 : x.date > y.date ? 1 : 0));

  if (aligned.length === 0) {
    throw new NoOverlapError(tickerA, tickerB);
  }

  const averages = trailingMean(
    aligned.map((p) => p.ratio),
    movingAverageWindow,
  );

  return aligned.map((p, i) => ({ ...p, movingAverage: averages[i] }));
}

/**
 * Fetch both histories for the lookback window and build the ratio series.
 *
 * @throws DataUnavailableError if either ticker has no data
 * @throws NoOverlapError if the two calendars are disjoint
 */
export async function computeTradeRatio(
  tickerA: string,
  tickerB: string,
  deps: Pick<AnalyticsDeps, "prices" | "settings" | "now">,
  options: TradeRatioOptions = {},
): Promise<RatioSeries> {
  const now = deps.now?.() ?? new Date();
  const window = lookbackWindow(options.lookbackDays ?? deps.settings.lookbackDays, now);
  const movingAverageWindow = options.movingAverageWindow ?? RATIO_MOVING_AVERAGE_WINDOW;

  const [barsA, barsB] = await Promise.all([
    deps.prices.getPriceHistory(tickerA, window.start, window.end),
    deps.prices.getPriceHistory(tickerB, window.start, window.end),
  ]);

  const points = buildRatioPoints(tickerA, tickerB, barsA, barsB, movingAverageWindow);
  const last = points[points.length - 1];

  return {
    tickerA,
    tickerB,
    window: { start: toIsoDate(window.start), end: toIsoDate(window.end) },
    movingAverageWindow,
    currentRatio: last ? last.ratio : null,
    points,
  };
}
