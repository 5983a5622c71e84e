/**
 * Token-to-USD cost calculation.
 */

import { pricingLogger } from '../utils/logger.js';
import type { PriceCatalog, PriceEntry } from './pricing.js';

const TOKENS_PER_MILLION = 1_000_000;

/** Unpriced models remembered before the set is cleared */
export const MAX_WARNED_MODELS = 256;

/** Models already reported as unpriced, so each is warned about once */
const warnedModels = new Set<string>();

/**
 * Cost of a token pair at the given rates.
 * Result is non-negative and linear in both token counts.
 */
export function costForTokens(promptTokens: number, completionTokens: number, entry: PriceEntry): number {
  return (promptTokens * entry.inputRate) / TOKENS_PER_MILLION
    + (completionTokens * entry.outputRate) / TOKENS_PER_MILLION;
}

/**
 * Resolve the model's pricing and compute the cost of a token pair.
 * Unpriced models are charged at the default rates.
 */
export function calculateCost(
  catalog: PriceCatalog,
  model: string,
  promptTokens: number,
  completionTokens: number,
): number {
  const { entry, matched } = catalog.resolve(model);
  if (!matched && !warnedModels.has(model)) {
    // Model names come from callers; keep the set bounded.
    if (warnedModels.size >= MAX_WARNED_MODELS) {
      warnedModels.clear();
    }
    warnedModels.add(model);
    pricingLogger.warn(
      { model, inputRate: entry.inputRate, outputRate: entry.outputRate },
      'No pricing for model, using default rates',
    );
  }
  return costForTokens(promptTokens, completionTokens, entry);
}

/** Round a USD amount half-up to six decimal places for reporting */
export function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}
