/**
 * Configuration loader for quota-gate.
 * Reads an optional JSON config file, applies env var and CLI overrides,
 * and validates with Zod.
 *
 * Priority: CLI flags > env vars > config file > Zod defaults
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../errors.js';
import { createModuleLogger } from '../utils/logger.js';
import { ConfigSchema, type Config } from './schema.js';

const log = createModuleLogger('config');

type RawConfig = Record<string, unknown>;

/** Values taken from command-line flags */
export interface CliOverrides {
  ceilingUsd?: number;
  pricingFile?: string;
  host?: string;
  port?: number;
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to QUOTA_GATE_CONFIG */
  configFile?: string;
  overrides?: CliOverrides;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Return obj[key] as an object, creating it when absent */
function ensureNested(obj: RawConfig, key: string): RawConfig {
  const current = obj[key];
  if (isRecord(current)) {
    return current;
  }
  const created: RawConfig = {};
  obj[key] = created;
  return created;
}

/** Parse a numeric env value, ignoring anything non-numeric */
function numericEnv(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    log.warn({ name, value }, 'Ignoring non-numeric environment variable');
    return undefined;
  }
  return parsed;
}

/**
 * Read a JSON config file.
 * @throws ConfigError when the file is missing, unreadable or not a JSON object
 */
async function readConfigFile(filePath: string): Promise<RawConfig> {
  try {
    const raw = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new ConfigError('Config file must contain a JSON object');
    }
    return parsed;
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Config file contains invalid JSON: ${error.message}`);
    }
    throw new ConfigError(`Failed to read config file: ${String(error)}`);
  }
}

/**
 * Applies environment variable overrides to the raw config object.
 * Supported env vars:
 *   QUOTA_GATE_CEILING              -> ceilingUsd
 *   QUOTA_GATE_PRICING_FILE         -> pricingFile
 *   QUOTA_GATE_ALLOWED_MODELS       -> allowedModelPrefixes (comma-separated)
 *   QUOTA_GATE_HOST                 -> server.host
 *   QUOTA_GATE_PORT                 -> server.port
 *   QUOTA_GATE_UPSTREAM_URL         -> upstream.baseUrl
 *   QUOTA_GATE_UPSTREAM_TIMEOUT_MS  -> upstream.timeoutMs
 */
export function applyEnvOverrides(config: RawConfig): RawConfig {
  const merged = structuredClone(config);

  const ceiling = numericEnv('QUOTA_GATE_CEILING');
  if (ceiling !== undefined) {
    merged.ceilingUsd = ceiling;
  }

  const pricingFile = process.env.QUOTA_GATE_PRICING_FILE;
  if (pricingFile) {
    merged.pricingFile = pricingFile;
  }

  const allowedModels = process.env.QUOTA_GATE_ALLOWED_MODELS;
  if (allowedModels !== undefined) {
    const prefixes = allowedModels.split(',').map((prefix) => prefix.trim()).filter((prefix) => prefix !== '');
    if (prefixes.length > 0) {
      merged.allowedModelPrefixes = prefixes;
    }
  }

  const host = process.env.QUOTA_GATE_HOST;
  if (host) {
    ensureNested(merged, 'server').host = host;
  }

  const port = numericEnv('QUOTA_GATE_PORT');
  if (port !== undefined) {
    ensureNested(merged, 'server').port = port;
  }

  const upstreamUrl = process.env.QUOTA_GATE_UPSTREAM_URL;
  if (upstreamUrl) {
    ensureNested(merged, 'upstream').baseUrl = upstreamUrl;
  }

  const timeoutMs = numericEnv('QUOTA_GATE_UPSTREAM_TIMEOUT_MS');
  if (timeoutMs !== undefined) {
    ensureNested(merged, 'upstream').timeoutMs = timeoutMs;
  }

  return merged;
}

/** Applies command-line overrides, which win over everything else */
export function applyCliOverrides(config: RawConfig, overrides: CliOverrides = {}): RawConfig {
  const merged = structuredClone(config);

  if (overrides.ceilingUsd !== undefined) {
    merged.ceilingUsd = overrides.ceilingUsd;
  }
  if (overrides.pricingFile !== undefined) {
    merged.pricingFile = overrides.pricingFile;
  }
  if (overrides.host !== undefined) {
    ensureNested(merged, 'server').host = overrides.host;
  }
  if (overrides.port !== undefined) {
    ensureNested(merged, 'server').port = overrides.port;
  }

  return merged;
}

/**
 * Loads the configuration, applies overrides and validates against ConfigSchema.
 *
 * @returns The fully-resolved and validated Config object
 * @throws {ConfigError} When the config file is malformed or validation fails
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const configFile = options.configFile ?? process.env.QUOTA_GATE_CONFIG;
  const rawFile = configFile ? await readConfigFile(configFile) : {};
  const merged = applyCliOverrides(applyEnvOverrides(rawFile), options.overrides);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config validation failed: ${issues}`);
  }

  log.info(
    { configFile: configFile ?? null, ceilingUsd: result.data.ceilingUsd, port: result.data.server.port },
    'Configuration loaded successfully',
  );
  return result.data;
}
