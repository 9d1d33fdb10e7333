/**
 * Financial Constants - Single Source of Truth
 *
 * All return, volatility, risk and allocation calculations MUST use these
 * constants. Do NOT duplicate them in other files. Import from here.
 */

/**
 * Trading Days Per Year
 *
 * Standard market assumption: 252 trading days per year (365 days - weekends - holidays).
 * Used for annualizing mean returns, volatility, downside deviation and tracking error.
 */
export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Value-at-Risk confidence levels reported on every performance report.
 * VaR(p) is the (1 - p) percentile of the daily return distribution.
 */
export const VAR_CONFIDENCE_95 = 0.95;
export const VAR_CONFIDENCE_99 = 0.99;

/**
 * Trailing window (observations) for the trade ratio moving average.
 */
export const RATIO_MOVING_AVERAGE_WINDOW = 20;

/**
 * Allowed distance of an allocation weight sum from 1.0.
 */
export const ALLOCATION_SUM_TOLERANCE = 1e-6;

/**
 * Weight given to a ticker added to a portfolio without an explicit allocation.
 */
export const DEFAULT_ALLOCATION_WEIGHT = 1.0;

/**
 * Minimum observations for variance-based statistics (sample stddev, beta,
 * correlation). Fewer than this and the statistic reports 0.
 */
export const MIN_OBSERVATIONS_FOR_VARIANCE = 2;

/**
 * Time Conversion Constants
 */
export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE; // 3,600,000ms
export const MS_PER_DAY = 24 * MS_PER_HOUR; // 86,400,000ms
