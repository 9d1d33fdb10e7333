import { rateLimiter } from "hono-rate-limiter";
import type { Context } from "hono";
import {
  RATE_LIMIT_MAX,
  RATE_LIMIT_WINDOW_MS,
} from "../config/constants.ts";

/**
 * Per-client rate limiter for the analytics API.
 *
 * 60 requests per minute, keyed by the forwarded client address. Requests
 * without one share the "anonymous" bucket.
 */
export const apiRateLimiter = rateLimiter({
  windowMs: RATE_LIMIT_WINDOW_MS,
  limit: RATE_LIMIT_MAX,
  keyGenerator: (c: Context) => {
    const forwarded = c.req.header("x-forwarded-for");
    return forwarded?.split(",")[0]?.trim() || "anonymous";
  },
});
