/**
 * Global Error Handler Middleware
 *
 * Catches unhandled errors in any route and returns a consistent
 * structured JSON response. Also logs errors with timestamps for
 * debugging.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { AppError } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Error response type
// ---------------------------------------------------------------------------

export interface StructuredError {
  error: string;
  code: string;
  status: number;
  details?: unknown;
}

// ---------------------------------------------------------------------------
// Error mapper: known error types → structured response
// ---------------------------------------------------------------------------

export function mapErrorToResponse(err: unknown): StructuredError {
  if (err instanceof AppError) {
    return {
      error: err.message,
      code: err.errorCode,
      status: err.statusCode,
      ...(err.details !== undefined && { details: err.details }),
    };
  }

  if (err instanceof Error) {
    if (err instanceof ZodError) {
      return {
        error: "Validation failed",
        code: "VALIDATION_FAILED",
        status: 400,
        details: {
          issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
        },
      };
    }

    if (err instanceof SyntaxError && err.message.includes("JSON")) {
      return {
        error: "Invalid request body",
        code: "INVALID_JSON",
        status: 400,
      };
    }

    return {
      error: "Internal server error",
      code: "INTERNAL_ERROR",
      status: 500,
    };
  }

  return {
    error: "An unexpected error occurred",
    code: "INTERNAL_ERROR",
    status: 500,
  };
}

// ---------------------------------------------------------------------------
// Logging helper
// ---------------------------------------------------------------------------

function logError(err: unknown, path: string, method: string, status: number): void {
  const timestamp = new Date().toISOString();
  const errMsg =
    err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  // Expected domain failures don't need a stack trace
  const stack = err instanceof Error && status >= 500 ? err.stack : undefined;

  console.error(
    JSON.stringify({
      level: status >= 500 ? "error" : "warn",
      timestamp,
      method,
      path,
      status,
      error: errMsg,
      ...(stack && { stack }),
    }),
  );
}

// ---------------------------------------------------------------------------
// Hono onError handler
// ---------------------------------------------------------------------------

/**
 * Global error handler for Hono's app.onError().
 *
 * Usage:
 *   app.onError(globalErrorHandler);
 */
export function globalErrorHandler(err: Error, c: Context): Response {
  const structured = mapErrorToResponse(err);

  logError(err, c.req.path, c.req.method, structured.status);

  return c.json(structured, structured.status as ContentfulStatusCode);
}

// ---------------------------------------------------------------------------
// 404 Not Found handler
// ---------------------------------------------------------------------------

/**
 * Global 404 handler for Hono's app.notFound().
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    {
      error: `Route ${c.req.method} ${c.req.path} not found`,
      code: "NOT_FOUND",
      status: 404,
    },
    404,
  );
}
