#!/usr/bin/env node

/**
 * quota-gate CLI entry point.
 */

import { Command } from 'commander';
import { startApp, VERSION } from './index.js';
import { parsePort, parseQuota, toOverrides, type CliOptions } from './cli/options.js';

const program = new Command();

program
  .name('quota-gate')
  .description('Budget-enforcing proxy for OpenAI-compatible chat completions')
  .version(VERSION)
  .option('--quota <usd>', 'global spend ceiling in USD (default: 2.0)', parseQuota)
  .option('--port <port>', 'port to listen on (default: 5000)', parsePort)
  .option('--host <host>', 'host to bind (default: 127.0.0.1)')
  .option('--pricing <file>', 'pricing CSV file (default: bundled config/model_pricing.csv)')
  .option('--config <file>', 'JSON config file')
  .action(async (options: CliOptions) => {
    try {
      await startApp({ configFile: options.config, overrides: toOverrides(options) });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Failed to start quota-gate: ${message}`);
      process.exit(1);
    }
  });

await program.parseAsync(process.argv);
