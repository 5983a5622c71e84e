/**
 * quota-gate main entry point.
 * Wires config, price catalog, budget ledger, upstream client, admission
 * controller and gateway together, and registers graceful shutdown.
 */

import { loadConfig, type CliOverrides, type Config } from './config/index.js';
import { PriceCatalog, buildAllowList, loadPriceCatalog, type Tokenizer } from './cost/index.js';
import { BudgetLedger } from './ledger/index.js';
import { AdmissionController } from './admission/index.js';
import { OpenAIUpstream } from './providers/index.js';
import { createGatewayServer, type GatewayServer } from './gateway/index.js';
import { createShutdownHandler, type ShutdownHandler } from './utils/shutdown.js';
import { createModuleLogger } from './utils/logger.js';
import type { CompletionUpstream } from './types/index.js';

export * from './errors.js';
export * from './config/index.js';
export * from './cost/index.js';
export * from './ledger/index.js';
export * from './admission/index.js';
export * from './providers/index.js';
export * from './gateway/index.js';
export type * from './types/index.js';

export const VERSION = '0.1.0';

const log = createModuleLogger('main');

/** Dependencies exposed by the startup for testing and shutdown. */
export interface AppContext {
  config: Config;
  catalog: PriceCatalog;
  ledger: BudgetLedger;
  controller: AdmissionController;
  gateway: GatewayServer;
  shutdownHandler: ShutdownHandler;
}

/** Options for starting the app, allowing dependency injection for tests. */
export interface StartOptions {
  /** Override config instead of loading it. */
  config?: Config;
  /** JSON config file to load. */
  configFile?: string;
  /** Command-line overrides applied over env and file values. */
  overrides?: CliOverrides;
  /** Inject an upstream instead of the OpenAI client. */
  upstream?: CompletionUpstream;
  /** Inject a tokenizer instead of tiktoken. */
  tokenizer?: Tokenizer;
  /** Skip starting the gateway listener (useful in tests). */
  skipGatewayListen?: boolean;
  /** Skip registering process signal handlers (useful in tests). */
  skipSignalHandlers?: boolean;
}

/**
 * Load the price catalog, continuing with an empty one when the file is unusable.
 */
async function loadCatalogOrEmpty(pricingFile: string): Promise<PriceCatalog> {
  try {
    return await loadPriceCatalog(pricingFile);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ pricingFile, error: message }, 'Failed to load pricing, using default pricing');
    return new PriceCatalog();
  }
}

/**
 * Start the quota-gate application.
 *
 * @param options - Optional overrides for testing and flexibility.
 * @returns The full AppContext with references to all subsystems.
 */
export async function startApp(options: StartOptions = {}): Promise<AppContext> {
  const config = options.config ?? await loadConfig({
    configFile: options.configFile,
    overrides: options.overrides,
  });

  const catalog = await loadCatalogOrEmpty(config.pricingFile);
  const allowList = buildAllowList(catalog.keys(), config.allowedModelPrefixes);
  const ledger = new BudgetLedger(config.ceilingUsd);
  const upstream = options.upstream ?? new OpenAIUpstream({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
  });

  const controller = new AdmissionController({
    catalog,
    ledger,
    upstream,
    allowList,
    tokenizer: options.tokenizer,
  });

  const gateway = createGatewayServer(controller);
  if (!options.skipGatewayListen) {
    await gateway.start(config.server.port, config.server.host);
  }

  const shutdownHandler = createShutdownHandler({
    installSignalHandlers: !options.skipSignalHandlers,
  });
  shutdownHandler.register('gateway', async () => {
    await gateway.stop();
  });

  log.info(
    {
      ceilingUsd: config.ceilingUsd,
      models: catalog.size,
      allowList,
      host: config.server.host,
      port: config.server.port,
    },
    'quota-gate started',
  );

  return { config, catalog, ledger, controller, gateway, shutdownHandler };
}
