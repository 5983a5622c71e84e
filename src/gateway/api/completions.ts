/**
 * Chat completion routes.
 * POST /v1/chat/completions: runs a request through admission and returns the
 *   upstream completion with proxy_usage attached.
 * GET  /v1/chat/completions: budget and catalog summary.
 * Both are also served under /api.
 */

import type { FastifyInstance } from 'fastify';
import type { AdmissionController } from '../../admission/controller.js';
import { roundUsd } from '../../cost/calculator.js';
import type { ProxiedCompletion } from '../../types/index.js';

export const COMPLETION_PATHS = ['/v1/chat/completions', '/api/v1/chat/completions'] as const;

/** Response shape for the status endpoint. */
export interface CompletionStatusResponse {
  info: string;
  cost_limit: number;
  current_cost: number;
  remaining: number;
  available_models: string[];
  models_count: number;
}

/**
 * Register the completion endpoints on the given Fastify instance.
 * Errors propagate to the server's error handler.
 */
export function registerCompletionRoutes(app: FastifyInstance, controller: AdmissionController): void {
  for (const path of COMPLETION_PATHS) {
    app.post<{ Reply: ProxiedCompletion }>(path, async (request, reply) => {
      const result = await controller.handle({
        authorization: request.headers.authorization,
        body: request.body,
        requestId: request.id,
      });
      return reply.status(200).send(result.response);
    });

    app.get<{ Reply: CompletionStatusResponse }>(path, async (_request, reply) => {
      const status = await controller.status();
      return reply.status(200).send({
        info: 'Local OpenAI proxy. Available method: POST.',
        cost_limit: status.ceiling,
        current_cost: roundUsd(status.totalSpent),
        remaining: roundUsd(status.remaining),
        available_models: status.models,
        models_count: status.modelsCount,
      });
    });
  }
}
