/**
 * Fastify server setup for the quota-gate gateway.
 * Registers CORS, the error mapper and the REST routes.
 * Provides start() and stop() lifecycle methods.
 */

import { fastify, type FastifyError, type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import type { AdmissionController } from '../admission/controller.js';
import { QuotaGateError } from '../errors.js';
import { gatewayLogger } from '../utils/logger.js';
import { registerHealthRoutes } from './api/health.js';
import { registerCompletionRoutes } from './api/completions.js';
import { registerPricingRoutes } from './api/pricing.js';

const log = gatewayLogger;

/** Body shape for every error response. */
export interface ErrorResponse {
  error: string;
  code: string;
}

/** The gateway server with start/stop lifecycle. */
export interface GatewayServer {
  /** The underlying Fastify instance (useful for testing via inject()). */
  readonly app: FastifyInstance;

  /**
   * Start listening on the given port and host.
   * @param port - TCP port to listen on.
   * @param host - Hostname or IP to bind to. Defaults to '127.0.0.1'.
   */
  start(port: number, host?: string): Promise<void>;

  /** Gracefully stop the server. */
  stop(): Promise<void>;
}

/**
 * Map a thrown error to an HTTP status and body.
 * Non-domain errors keep a Fastify-provided 4xx status and otherwise become 500.
 */
export function toErrorResponse(error: FastifyError | Error): { statusCode: number; body: ErrorResponse } {
  if (error instanceof QuotaGateError) {
    return { statusCode: error.statusCode, body: { error: error.message, code: error.code } };
  }

  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500
    ? error.statusCode
    : 500;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR';
  return {
    statusCode,
    body: { error: statusCode === 500 ? 'Internal server error' : error.message, code },
  };
}

/**
 * Create and configure the gateway Fastify server.
 *
 * @param controller - Admission controller backing the routes.
 * @returns A configured {@link GatewayServer} instance ready to be started.
 */
export function createGatewayServer(controller: AdmissionController): GatewayServer {
  const app = fastify({
    logger: false, // We use our own pino logger
    forceCloseConnections: true,
  });

  app.register(fastifyCors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Bodies are kept as text so the budget gate and credential check run
  // before any JSON parsing.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (statusCode >= 500) {
      log.error({ err: error, url: request.url, requestId: request.id }, 'Request failed');
    }
    return reply.status(statusCode).send(body);
  });

  registerHealthRoutes(app);
  registerCompletionRoutes(app, controller);
  registerPricingRoutes(app, controller);

  return {
    get app(): FastifyInstance {
      return app;
    },

    async start(port: number, host: string = '127.0.0.1'): Promise<void> {
      try {
        await app.listen({ port, host });
        log.info({ port, host }, 'Gateway server started');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, 'Failed to start gateway server');
        throw error;
      }
    },

    async stop(): Promise<void> {
      try {
        await app.close();
        log.info('Gateway server stopped');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, 'Error stopping gateway server');
        throw error;
      }
    },
  };
}
