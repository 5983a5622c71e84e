/**
 * Health check route handler.
 * GET /health: liveness only; does not touch the ledger.
 */

import type { FastifyInstance } from 'fastify';

interface HealthResponse {
  status: 'ok';
}

/**
 * Register the health endpoint on the given Fastify instance.
 */
export function registerHealthRoutes(app: FastifyInstance): void {
  app.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok' });
  });
}
