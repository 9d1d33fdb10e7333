/**
 * Input Validation Middleware
 *
 * Zod-based request validation for Hono routes.
 * Provides reusable validation schemas and a generic validator factory.
 */

import { createMiddleware } from "hono/factory";
import { z } from "zod";
import {
  MAX_LOOKBACK_DAYS,
  MAX_PORTFOLIOS_PER_COMPARISON,
  PORTFOLIO_DESCRIPTION_MAX_LENGTH,
  PORTFOLIO_NAME_MAX_LENGTH,
  TICKER_MAX_LENGTH,
  TICKER_PATTERN,
} from "../config/constants.ts";

// ---------------------------------------------------------------------------
// Validation error response format
// ---------------------------------------------------------------------------

interface ValidationErrorResponse {
  error: string;
  code: string;
  status: number;
  details: {
    issues: Array<{
      path: string;
      message: string;
    }>;
  };
}

function toIssues(error: z.ZodError) {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    message: i.message,
  }));
}

// ---------------------------------------------------------------------------
// Generic validator middleware factory
// ---------------------------------------------------------------------------

/**
 * Creates Hono middleware that validates the JSON request body
 * against a Zod schema. On failure, returns a structured 400 error.
 * On success, the parsed data is available at c.get("validatedBody").
 */
export function validateBody<T extends z.ZodType>(schema: T) {
  return createMiddleware<{ Variables: { validatedBody: z.output<T> } }>(
    async (c, next) => {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        const resp: ValidationErrorResponse = {
          error: "Request body must be valid JSON",
          code: "INVALID_JSON",
          status: 400,
          details: { issues: [{ path: "body", message: "Failed to parse JSON" }] },
        };
        return c.json(resp, 400);
      }

      const result = schema.safeParse(body);
      if (!result.success) {
        const resp: ValidationErrorResponse = {
          error: "Validation failed",
          code: "VALIDATION_FAILED",
          status: 400,
          details: { issues: toIssues(result.error) },
        };
        return c.json(resp, 400);
      }

      c.set("validatedBody", result.data);
      await next();
    },
  );
}

/**
 * Creates Hono middleware that validates query string parameters
 * against a Zod schema. On failure, returns a structured 400 error.
 * On success, the parsed data is available at c.get("validatedQuery").
 */
export function validateQuery<T extends z.ZodType>(schema: T) {
  return createMiddleware<{ Variables: { validatedQuery: z.output<T> } }>(
    async (c, next) => {
      const result = schema.safeParse(c.req.query());
      if (!result.success) {
        const resp: ValidationErrorResponse = {
          error: "Invalid query parameters",
          code: "VALIDATION_FAILED",
          status: 400,
          details: { issues: toIssues(result.error) },
        };
        return c.json(resp, 400);
      }

      c.set("validatedQuery", result.data);
      await next();
    },
  );
}

// ---------------------------------------------------------------------------
// Reusable schemas
// ---------------------------------------------------------------------------

const tickerSchema = z
  .string()
  .trim()
  .min(1, "ticker is required")
  .max(TICKER_MAX_LENGTH, "ticker too long")
  .regex(TICKER_PATTERN, "ticker may only contain letters, digits, '.' and '-'")
  .transform((t) => t.toUpperCase());

const daysSchema = z
  .string()
  .regex(/^\d+$/, "days must be a whole number")
  .transform(Number)
  .pipe(z.number().min(2).max(MAX_LOOKBACK_DAYS))
  .optional();

/** Route param :id */
export const portfolioIdSchema = z.coerce.number().int().positive();

/** Schema for portfolio creation body */
export const createPortfolioSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "name is required")
    .max(PORTFOLIO_NAME_MAX_LENGTH, "name must be 64 characters or less"),
  description: z.string().max(PORTFOLIO_DESCRIPTION_MAX_LENGTH).optional(),
});

/** Schema for attaching a ticker to a portfolio */
export const addStockSchema = z.object({
  ticker: tickerSchema,
  allocation: z.number().min(0).max(1).optional(),
});

/**
 * Schema for a rebalance body. Range and sum rules are enforced by the
 * rebalancer so they come back as allocation_invalid.
 */
export const rebalanceSchema = z.object({
  weights: z.record(tickerSchema, z.number()),
});

/** Schema for tracking a new position */
export const positionSchema = z.object({
  ticker: tickerSchema,
  shares: z.number().min(0, "shares must be >= 0").default(0),
});

/** Schema for a share count update */
export const updateSharesSchema = z.object({
  shares: z.number().min(0, "shares must be >= 0"),
});

/** ?days= */
export const lookbackQuerySchema = z.object({
  days: daysSchema,
});

/** ?ids=1,2,3&days= */
export const compareQuerySchema = z.object({
  ids: z
    .string()
    .transform((raw) =>
      raw
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    )
    .pipe(
      z
        .array(z.coerce.number<string>().int().positive())
        .min(2, "at least 2 portfolio ids are required")
        .max(MAX_PORTFOLIOS_PER_COMPARISON),
    ),
  days: daysSchema,
});

/** ?a=AAPL&b=MSFT&days= */
export const ratioQuerySchema = z.object({
  a: tickerSchema,
  b: tickerSchema,
  days: daysSchema,
});
