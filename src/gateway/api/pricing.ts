/**
 * Pricing route handler.
 * GET /pricing and /api/pricing: the loaded price catalog keyed by model.
 */

import type { FastifyInstance } from 'fastify';
import type { AdmissionController } from '../../admission/controller.js';
import type { PriceEntry } from '../../cost/pricing.js';

interface PricingResponse {
  pricing: Record<string, PriceEntry>;
}

/**
 * Register the pricing endpoints on the given Fastify instance.
 */
export function registerPricingRoutes(app: FastifyInstance, controller: AdmissionController): void {
  for (const path of ['/pricing', '/api/pricing']) {
    app.get<{ Reply: PricingResponse }>(path, async (_request, reply) => {
      return reply.status(200).send({ pricing: controller.pricing() });
    });
  }
}
