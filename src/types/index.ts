/**
 * Shared interface definitions for quota-gate.
 */

import type { ChatRequest } from '../admission/request.js';

export type { ChatMessage, ChatRequest } from '../admission/request.js';

// === Upstream ===

export interface CompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface CompletionChoice {
  index: number;
  message: {
    role: string;
    content: string | null;
  };
  finish_reason: string | null;
}

/** The fields of an upstream chat completion the gateway relies on */
export interface UpstreamCompletion {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: CompletionChoice[];
  usage?: CompletionUsage;
}

/** Anything that can perform a chat completion on behalf of a caller */
export interface CompletionUpstream {
  complete(request: ChatRequest, apiKey: string): Promise<UpstreamCompletion>;
}

// === Admission ===

/** Accounting attached to every proxied completion */
export interface ProxyUsage {
  prompt_tokens: number;
  completion_tokens: number;
  cost_usd: number;
}

export type ProxiedCompletion = UpstreamCompletion & { proxy_usage: ProxyUsage };

export interface StatusSnapshot {
  ceiling: number;
  totalSpent: number;
  remaining: number;
  models: string[];
  modelsCount: number;
}
