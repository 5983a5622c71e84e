/**
 * Model allow-list derived from the price catalog.
 * A request model is allowed when it starts with any listed prefix.
 */

/** Used when neither configuration nor the catalog provide prefixes */
export const FALLBACK_ALLOWED_MODELS: readonly string[] = [
  'gpt-4o',
  'gpt-4-1106-preview',
  'gpt-4.1',
  'o3',
  'o4',
  'gpt-3.5',
];

/**
 * Build the allow-list.
 * A configured list wins. Otherwise catalog keys are sorted and any key
 * already covered by a shorter listed prefix is dropped.
 */
export function buildAllowList(catalogKeys: readonly string[], configured?: readonly string[]): string[] {
  if (configured && configured.length > 0) {
    return [...configured];
  }

  const sorted = [...catalogKeys].sort();
  const prefixes: string[] = [];
  for (const key of sorted) {
    if (!prefixes.some((prefix) => key.startsWith(prefix))) {
      prefixes.push(key);
    }
  }

  return prefixes.length > 0 ? prefixes : [...FALLBACK_ALLOWED_MODELS];
}

/** Check a model identifier against the allow-list */
export function isModelAllowed(model: string, allowList: readonly string[]): boolean {
  return allowList.some((prefix) => model.startsWith(prefix));
}
