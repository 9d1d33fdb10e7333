/**
 * Standardized Error Handling
 *
 * Domain errors raised by the analytics engine and the portfolio store.
 * Each carries an HTTP status and a machine-readable code so routes can
 * surface structural failures unchanged.
 * Format on the wire: { error: string, code: string, status: number, details?: unknown }
 */

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 400 Bad Request
  VALIDATION_FAILED: { status: 400, code: "VALIDATION_FAILED" },
  ALLOCATION_INVALID: { status: 400, code: "allocation_invalid" },

  // 404 Not Found
  PORTFOLIO_NOT_FOUND: { status: 404, code: "portfolio_not_found" },
  POSITION_NOT_FOUND: { status: 404, code: "position_not_found" },

  // 409 Conflict
  PORTFOLIO_EXISTS: { status: 409, code: "portfolio_exists" },

  // 422 Unprocessable
  INSUFFICIENT_HISTORY: { status: 422, code: "insufficient_history" },
  INSUFFICIENT_DATA: { status: 422, code: "insufficient_data" },
  NO_OVERLAP: { status: 422, code: "no_overlap" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },

  // 502 Bad Gateway
  DATA_UNAVAILABLE: { status: 502, code: "data_unavailable" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

// ---------------------------------------------------------------------------
// Base application error
// ---------------------------------------------------------------------------

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.statusCode = ErrorCodes[code].status;
    this.errorCode = ErrorCodes[code].code;
    this.details = details;
  }
}

// ---------------------------------------------------------------------------
// Domain errors
// ---------------------------------------------------------------------------

/** Provider has no data for the requested ticker/window, or is unreachable. */
export class DataUnavailableError extends AppError {
  constructor(
    public readonly ticker: string,
    reason: string,
  ) {
    super("DATA_UNAVAILABLE", `No market data for ${ticker}: ${reason}`);
    this.name = "DataUnavailableError";
  }
}

/** Fewer than 2 usable observations to build a return series. */
export class InsufficientHistoryError extends AppError {
  constructor(message: string) {
    super("INSUFFICIENT_HISTORY", message);
    this.name = "InsufficientHistoryError";
  }
}

/** A multi-portfolio request could not gather enough usable reports. */
export class InsufficientDataError extends AppError {
  constructor(message: string, details?: unknown) {
    super("INSUFFICIENT_DATA", message, details);
    this.name = "InsufficientDataError";
  }
}

/** Two price series share no trading date. */
export class NoOverlapError extends AppError {
  constructor(tickerA: string, tickerB: string) {
    super("NO_OVERLAP", `No overlapping data between ${tickerA} and ${tickerB}`);
    this.name = "NoOverlapError";
  }
}

export interface AllocationIssue {
  ticker?: string;
  message: string;
}

/** Proposed weights fail the sum/range invariant. Nothing was committed. */
export class AllocationInvalidError extends AppError {
  constructor(public readonly issues: AllocationIssue[]) {
    super("ALLOCATION_INVALID", "Allocation weights are invalid", { issues });
    this.name = "AllocationInvalidError";
  }
}

export class PortfolioNotFoundError extends AppError {
  constructor(portfolioId: number) {
    super("PORTFOLIO_NOT_FOUND", `Portfolio not found: ${portfolioId}`);
    this.name = "PortfolioNotFoundError";
  }
}

export class PositionNotFoundError extends AppError {
  constructor(ticker: string) {
    super("POSITION_NOT_FOUND", `Position not found: ${ticker}`);
    this.name = "PositionNotFoundError";
  }
}

export class PortfolioExistsError extends AppError {
  constructor(name: string) {
    super("PORTFOLIO_EXISTS", `Portfolio with name '${name}' already exists`);
    this.name = "PortfolioExistsError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract a printable message from any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
