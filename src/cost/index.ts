/**
 * Cost module barrel export.
 * Re-exports pricing, token counting, cost calculation and budget utilities.
 */

export { PriceCatalog, DEFAULT_PRICE, parsePrice, parsePricingCsv, loadPriceCatalog } from './pricing.js';
export type { PriceEntry, PriceResolution } from './pricing.js';
export { parseCsv } from './csv.js';
export { costForTokens, calculateCost, roundUsd } from './calculator.js';
export {
  countTokens,
  countMessageTokens,
  countCompletionTokens,
  encodingForModel,
  tiktokenTokenizer,
} from './tokens.js';
export type { Tokenizer, CountableMessage, CountableChoice } from './tokens.js';
export { remainingBudget, wouldExceed, isExhausted } from './budget.js';
export { buildAllowList, isModelAllowed, FALLBACK_ALLOWED_MODELS } from './allow-list.js';
