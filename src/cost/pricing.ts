/**
 * Model price catalog.
 * Built once at startup from a CSV table (model, version, input, cached_input, output)
 * and read-only afterwards. Rates are USD per one million tokens.
 */

import { readFile } from 'node:fs/promises';
import { PricingLoadError } from '../errors.js';
import { pricingLogger } from '../utils/logger.js';
import { parseCsv } from './csv.js';

/** Pricing rates for one catalog key */
export interface PriceEntry {
  /** The `model` column of the row that produced this entry */
  readonly modelKey: string;
  readonly version: string;
  readonly inputRate: number;
  /** Informational only; not used when computing cost */
  readonly cachedInputRate: number;
  readonly outputRate: number;
}

/** Result of a catalog lookup */
export interface PriceResolution {
  entry: PriceEntry;
  /** False when the default entry was returned */
  matched: boolean;
}

/** Columns a pricing row must provide */
const REQUIRED_FIELDS = 5;

/**
 * Conservative rates used for any model the catalog cannot resolve.
 */
export const DEFAULT_PRICE: PriceEntry = Object.freeze({
  modelKey: 'default',
  version: '',
  inputRate: 30,
  cachedInputRate: 0,
  outputRate: 60,
});

const DECIMAL_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a non-negative decimal price.
 * @returns The numeric value, or undefined when the text is not a valid price
 */
export function parsePrice(value: string): number | undefined {
  if (!DECIMAL_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Immutable mapping from catalog key to price entry.
 * A short model name and its dated release may both be keys for identical rates.
 */
export class PriceCatalog {
  private readonly entries: ReadonlyMap<string, PriceEntry>;

  constructor(entries: Iterable<readonly [string, PriceEntry]> = []) {
    const map = new Map<string, PriceEntry>();
    for (const [key, entry] of entries) {
      map.set(key, Object.freeze({ ...entry }));
    }
    this.entries = map;
  }

  /** Number of catalog keys */
  get size(): number {
    return this.entries.size;
  }

  /** All catalog keys */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Exact-key lookup without prefix matching or defaults */
  get(key: string): PriceEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Resolve a model identifier to its pricing.
   * Exact keys win; otherwise the longest key that prefixes the identifier;
   * otherwise DEFAULT_PRICE.
   */
  resolve(model: string): PriceResolution {
    const exact = this.entries.get(model);
    if (exact) {
      return { entry: exact, matched: true };
    }

    let best: { key: string; entry: PriceEntry } | undefined;
    for (const [key, entry] of this.entries) {
      if (model.startsWith(key) && (!best || key.length > best.key.length)) {
        best = { key, entry };
      }
    }

    return best ? { entry: best.entry, matched: true } : { entry: DEFAULT_PRICE, matched: false };
  }

  /** Pricing dump keyed by catalog key */
  toJSON(): Record<string, PriceEntry> {
    return Object.fromEntries(this.entries);
  }
}

/**
 * Build a catalog from CSV text.
 * Malformed rows are skipped with a warning; the document as a whole must hold
 * a header and at least one data row.
 * @throws PricingLoadError when there are fewer than two records
 */
export function parsePricingCsv(text: string): PriceCatalog {
  const records = parseCsv(text);
  if (records.length < 2) {
    throw new PricingLoadError('CSV file must contain at least header and one data row');
  }

  const entries: Array<[string, PriceEntry]> = [];

  for (const record of records.slice(1)) {
    if (record.length < REQUIRED_FIELDS) {
      pricingLogger.warn({ record }, 'Skipping incomplete pricing row');
      continue;
    }

    const [model, version, inputField, cachedField, outputField] = record;

    const inputRate = parsePrice(inputField);
    if (inputRate === undefined) {
      pricingLogger.warn({ model, value: inputField }, 'Invalid input price, skipping row');
      continue;
    }

    const outputRate = parsePrice(outputField);
    if (outputRate === undefined) {
      pricingLogger.warn({ model, value: outputField }, 'Invalid output price, skipping row');
      continue;
    }

    const entry: PriceEntry = {
      modelKey: model,
      version,
      inputRate,
      cachedInputRate: parsePrice(cachedField) ?? 0,
      outputRate,
    };

    entries.push([model, entry]);
    if (version !== '' && version !== model) {
      entries.push([version, entry]);
    }
  }

  return new PriceCatalog(entries);
}

/**
 * Read and parse a pricing CSV file.
 * @param filePath - Path to the CSV file
 * @throws PricingLoadError when the file cannot be read or has too few records
 */
export async function loadPriceCatalog(filePath: string): Promise<PriceCatalog> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PricingLoadError(`Cannot open pricing file: ${message}`);
  }

  const catalog = parsePricingCsv(text);
  pricingLogger.info({ filePath, models: catalog.size }, 'Loaded model pricing');
  return catalog;
}
