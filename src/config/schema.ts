/**
 * Configuration schema for quota-gate.
 * Defines the full Zod schema with defaults for every setting.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/** Pricing table shipped with the package */
export const DEFAULT_PRICING_FILE = fileURLToPath(new URL('../../config/model_pricing.csv', import.meta.url));

export const ConfigSchema = z.object({
  // Zero or negative means every request is refused as exhausted.
  ceilingUsd: z.number().finite().default(2.0),
  pricingFile: z.string().min(1).default(DEFAULT_PRICING_FILE),
  allowedModelPrefixes: z.array(z.string().min(1)).optional(),
  server: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(5000),
  }).default({}),
  upstream: z.object({
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    timeoutMs: z.number().int().positive().default(600_000),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Raw, pre-validation config shape accepted from files and overrides */
export type ConfigInput = z.input<typeof ConfigSchema>;
