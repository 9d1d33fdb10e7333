/**
 * Allocation Validator / Rebalancer
 *
 * A proposed {ticker → weight} map is accepted only when every weight is in
 * [0, 1] and the weights sum to 1 within ALLOCATION_SUM_TOLERANCE. Accepted
 * weights are upserted per ticker in one transaction; tickers not in the map
 * keep their existing weight. A rejected map changes nothing.
 */

import { ALLOCATION_SUM_TOLERANCE } from "../config/financial-constants.ts";
import {
  AllocationInvalidError,
  PortfolioNotFoundError,
  type AllocationIssue,
} from "../lib/errors.ts";
import type { PortfolioRepository } from "./portfolio-repository.ts";
import type { PortfolioAllocation } from "./types.ts";

export interface AllocationValidation {
  valid: boolean;
  sum: number;
  issues: AllocationIssue[];
}

export interface RebalanceResult {
  portfolioId: number;
  applied: Record<string, number>;
  /** Full allocation set after the commit */
  allocations: PortfolioAllocation[];
}

/**
 * Check a weight map against the range and sum invariants.
 */
export function validateAllocation(weights: Record<string, number>): AllocationValidation {
  const issues: AllocationIssue[] = [];
  const entries = Object.entries(weights);

  if (entries.length === 0) {
    issues.push({ message: "At least one ticker weight is required" });
  }

  let sum = 0;
  for (const [ticker, weight] of entries) {
    if (!Number.isFinite(weight)) {
      issues.push({ ticker, message: "Weight must be a finite number" });
      continue;
    }
    if (weight < 0 || weight > 1) {
      issues.push({ ticker, message: `Weight ${weight} is outside [0, 1]` });
    }
    sum += weight;
  }

  if (entries.length > 0 && Math.abs(sum - 1) > ALLOCATION_SUM_TOLERANCE) {
    issues.push({ message: `Weights sum to ${sum}, expected 1` });
  }

  return { valid: issues.length === 0, sum, issues };
}

/**
 * Validate and, if valid, commit new weights for a portfolio.
 *
 * @throws PortfolioNotFoundError if the portfolio does not exist
 * @throws AllocationInvalidError if the weights fail validation (no write)
 */
export async function validateAndRebalance(
  portfolioId: number,
  weights: Record<string, number>,
  repository: PortfolioRepository,
): Promise<RebalanceResult> {
  const validation = validateAllocation(weights);
  if (!validation.valid) {
    throw new AllocationInvalidError(validation.issues);
  }

  const before = await repository.findPortfolio(portfolioId);
  if (!before) {
    throw new PortfolioNotFoundError(portfolioId);
  }

  // Allocations reference tracked positions
  const positions = await repository.listPositions();
  const tracked = new Set(positions.map((p) => p.ticker));
  const untracked = Object.keys(weights).filter((ticker) => !tracked.has(ticker));
  if (untracked.length > 0) {
    throw new AllocationInvalidError(
      untracked.map((ticker) => ({ ticker, message: "Ticker is not a tracked position" })),
    );
  }

  await repository.upsertAllocations(portfolioId, weights);
  console.log(
    `[Rebalancer] Portfolio ${portfolioId}: updated ${Object.keys(weights).length} weights`,
  );

  const after = await repository.findPortfolio(portfolioId);
  return {
    portfolioId,
    applied: { ...weights },
    allocations: after ? [...after.allocations] : [],
  };
}
