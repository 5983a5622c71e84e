/**
 * Graceful shutdown handler.
 * Cleanup steps run in reverse registration order; a timer forces the
 * process out if they hang.
 */

import { createModuleLogger } from './logger.js';

const log = createModuleLogger('shutdown');

const DEFAULT_TIMEOUT_MS = 10_000;

/** Function signature for cleanup callbacks */
export type CleanupFunction = () => Promise<void> | void;

interface CleanupStep {
  label: string;
  fn: CleanupFunction;
}

export interface ShutdownOptions {
  /** Listen for SIGINT and SIGTERM. Defaults to true. */
  installSignalHandlers?: boolean;
  /** Force-exit deadline once shutdown starts. */
  timeoutMs?: number;
}

export interface ShutdownHandler {
  register(label: string, fn: CleanupFunction): void;
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
  /** Detach the signal listeners installed by this handler. */
  dispose(): void;
}

/**
 * Create a shutdown handler.
 *
 * @example
 * ```ts
 * const handler = createShutdownHandler();
 * handler.register('gateway', () => gateway.stop());
 * ```
 */
export function createShutdownHandler(options: ShutdownOptions = {}): ShutdownHandler {
  const steps: CleanupStep[] = [];
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) {
      log.warn('Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    shuttingDown = true;
    log.info({ steps: steps.length }, 'Shutdown initiated');

    const forceExitTimer = setTimeout(() => {
      log.error({ timeoutMs }, 'Shutdown timed out, forcing exit');
      process.exit(1);
    }, timeoutMs);
    forceExitTimer.unref();

    for (const step of [...steps].reverse()) {
      try {
        await step.fn();
        log.info({ label: step.label }, 'Cleanup completed');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ label: step.label, error: message }, 'Cleanup failed');
      }
    }

    clearTimeout(forceExitTimer);
    log.info('All cleanup complete');
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Received signal');
    void shutdown().then(() => {
      process.exit(0);
    });
  };

  const installed = options.installSignalHandlers ?? true;
  if (installed) {
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  }

  return {
    register(label: string, fn: CleanupFunction): void {
      steps.push({ label, fn });
    },
    shutdown,
    isShuttingDown(): boolean {
      return shuttingDown;
    },
    dispose(): void {
      if (installed) {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    },
  };
}
