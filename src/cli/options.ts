/**
 * Command-line flag parsing.
 */

import { InvalidArgumentError } from 'commander';
import type { CliOverrides } from '../config/loader.js';

export interface CliOptions {
  quota?: number;
  port?: number;
  host?: string;
  pricing?: string;
  config?: string;
}

/** Parse a USD amount; zero or below refuses every request */
export function parseQuota(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Quota must be a number.');
  }
  return parsed;
}

/** Parse a TCP port */
export function parsePort(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return parsed;
}

/** Map parsed flags onto config overrides */
export function toOverrides(options: CliOptions): CliOverrides {
  return {
    ceilingUsd: options.quota,
    port: options.port,
    host: options.host,
    pricingFile: options.pricing,
  };
}
