/**
 * Budget checks against the global spend ceiling.
 * All checks are deterministic and side-effect free.
 */

/**
 * Remaining headroom under the ceiling.
 * Negative when spend has overshot.
 */
export function remainingBudget(totalSpentUsd: number, ceilingUsd: number): number {
  return ceilingUsd - totalSpentUsd;
}

/**
 * Check whether adding a cost would reach or pass the ceiling.
 * Reaching the ceiling exactly counts as exceeding it.
 * @param totalSpentUsd - Amount already spent in USD
 * @param ceilingUsd - Global spend ceiling in USD
 * @param costUsd - Cost of the next operation in USD
 */
export function wouldExceed(totalSpentUsd: number, ceilingUsd: number, costUsd: number): boolean {
  return totalSpentUsd + costUsd >= ceilingUsd;
}

/** True once spend has reached the ceiling */
export function isExhausted(totalSpentUsd: number, ceilingUsd: number): boolean {
  return totalSpentUsd >= ceilingUsd;
}
