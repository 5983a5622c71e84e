import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadConfig } from '../../../src/config/loader.js';
import { DEFAULT_PRICING_FILE } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/errors.js';

describe('config loader', () => {
  const originalEnv = process.env;
  let tmpDir: string;

  async function writeConfig(data: unknown): Promise<string> {
    const file = path.join(tmpDir, 'config.json');
    await writeFile(file, JSON.stringify(data), 'utf-8');
    return file;
  }

  beforeEach(async () => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('QUOTA_GATE_')) {
        delete process.env[key];
      }
    }
    tmpDir = await mkdtemp(path.join(os.tmpdir(), 'quota-gate-config-test-'));
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('applies defaults when no config file is given', async () => {
    const config = await loadConfig();

    expect(config).toEqual({
      ceilingUsd: 2,
      pricingFile: DEFAULT_PRICING_FILE,
      server: { host: '127.0.0.1', port: 5000 },
      upstream: { baseUrl: 'https://api.openai.com/v1', timeoutMs: 600_000 },
    });
  });

  it('points the default pricing file at the bundled table', () => {
    expect(DEFAULT_PRICING_FILE.endsWith(path.join('config', 'model_pricing.csv'))).toBe(true);
  });

  it('loads values from a config file', async () => {
    const file = await writeConfig({ ceilingUsd: 5, server: { port: 8080 }, allowedModelPrefixes: ['o3'] });

    const config = await loadConfig({ configFile: file });

    expect(config.ceilingUsd).toBe(5);
    expect(config.server).toEqual({ host: '127.0.0.1', port: 8080 });
    expect(config.allowedModelPrefixes).toEqual(['o3']);
  });

  it('reads the config file named by QUOTA_GATE_CONFIG', async () => {
    process.env.QUOTA_GATE_CONFIG = await writeConfig({ ceilingUsd: 7 });

    const config = await loadConfig();

    expect(config.ceilingUsd).toBe(7);
  });

  it('lets env vars override file values', async () => {
    const file = await writeConfig({ ceilingUsd: 5, server: { host: '0.0.0.0', port: 8080 } });
    process.env.QUOTA_GATE_CEILING = '3.5';
    process.env.QUOTA_GATE_PORT = '9000';
    process.env.QUOTA_GATE_ALLOWED_MODELS = 'gpt-4o, o3 ,';
    process.env.QUOTA_GATE_UPSTREAM_URL = 'http://127.0.0.1:4010/v1';
    process.env.QUOTA_GATE_UPSTREAM_TIMEOUT_MS = '1500';
    process.env.QUOTA_GATE_PRICING_FILE = '/tmp/pricing.csv';

    const config = await loadConfig({ configFile: file });

    expect(config).toEqual({
      ceilingUsd: 3.5,
      pricingFile: '/tmp/pricing.csv',
      allowedModelPrefixes: ['gpt-4o', 'o3'],
      server: { host: '0.0.0.0', port: 9000 },
      upstream: { baseUrl: 'http://127.0.0.1:4010/v1', timeoutMs: 1500 },
    });
  });

  it('ignores non-numeric numeric env vars', async () => {
    process.env.QUOTA_GATE_CEILING = 'lots';
    process.env.QUOTA_GATE_PORT = 'eighty';

    const config = await loadConfig();

    expect(config.ceilingUsd).toBe(2);
    expect(config.server.port).toBe(5000);
  });

  it('lets CLI overrides win over env vars', async () => {
    process.env.QUOTA_GATE_CEILING = '3.5';
    process.env.QUOTA_GATE_HOST = '0.0.0.0';

    const config = await loadConfig({
      overrides: { ceilingUsd: 0.25, host: 'localhost', port: 6000, pricingFile: 'prices.csv' },
    });

    expect(config.ceilingUsd).toBe(0.25);
    expect(config.server).toEqual({ host: 'localhost', port: 6000 });
    expect(config.pricingFile).toBe('prices.csv');
  });

  it('accepts a zero ceiling', async () => {
    const config = await loadConfig({ overrides: { ceilingUsd: 0 } });
    expect(config.ceilingUsd).toBe(0);
  });

  it('accepts a negative ceiling from the environment', async () => {
    process.env.QUOTA_GATE_CEILING = '-1';
    const config = await loadConfig();
    expect(config.ceilingUsd).toBe(-1);
  });

  it('rejects a non-finite ceiling', async () => {
    await expect(loadConfig({ overrides: { ceilingUsd: Number.POSITIVE_INFINITY } })).rejects.toThrow(ConfigError);
  });

  it('rejects an out-of-range port with the issue path', async () => {
    const file = await writeConfig({ server: { port: 70000 } });
    await expect(loadConfig({ configFile: file })).rejects.toThrow(/Config validation failed: server\.port/);
  });

  it('rejects a missing config file', async () => {
    const missing = path.join(tmpDir, 'missing.json');
    await expect(loadConfig({ configFile: missing })).rejects.toThrow(`Config file not found: ${missing}`);
  });

  it('rejects invalid JSON', async () => {
    const file = path.join(tmpDir, 'broken.json');
    await writeFile(file, '{ not json', 'utf-8');
    await expect(loadConfig({ configFile: file })).rejects.toThrow(/Config file contains invalid JSON/);
  });

  it('rejects a JSON document that is not an object', async () => {
    const file = await writeConfig([1, 2, 3]);
    await expect(loadConfig({ configFile: file })).rejects.toThrow('Config file must contain a JSON object');
  });
});
