/** Rate limit: requests per window per client */
export const RATE_LIMIT_MAX = 60;

/** Rate limit window in milliseconds (1 minute) */
export const RATE_LIMIT_WINDOW_MS = 60_000;

// ---------------------------------------------------------------------------
// Request limits
// ---------------------------------------------------------------------------

/**
 * Maximum length for a ticker symbol (e.g., "AAPL", "BRK.B", "RDS-A").
 */
export const TICKER_MAX_LENGTH = 12;

/** Allowed ticker characters: letters, digits, dot and dash */
export const TICKER_PATTERN = /^[A-Za-z0-9.\-]+$/;

/** Maximum length of a portfolio name */
export const PORTFOLIO_NAME_MAX_LENGTH = 64;

/** Maximum length of a portfolio description */
export const PORTFOLIO_DESCRIPTION_MAX_LENGTH = 500;

/** Longest history window a request may ask for (10 years) */
export const MAX_LOOKBACK_DAYS = 3650;

/** Most portfolios accepted in one comparison request */
export const MAX_PORTFOLIOS_PER_COMPARISON = 10;
