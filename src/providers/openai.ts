/**
 * OpenAI upstream adapter.
 * Forwards validated chat requests with the caller's own credential.
 * Works with any OpenAI-compatible API via a custom baseURL.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { APIError, APIConnectionError, RateLimitError, AuthenticationError } from 'openai/error';
import { UpstreamError } from '../errors.js';
import { upstreamLogger } from '../utils/logger.js';
import type { ChatMessage, ChatRequest, CompletionUpstream, UpstreamCompletion } from '../types/index.js';

/** Configuration for the OpenAI upstream */
export interface OpenAIUpstreamConfig {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Convert a validated message to OpenAI's message param format.
 */
function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  const name = message.name ? { name: message.name } : {};
  switch (message.role) {
    case 'function':
      return { role: 'function', name: message.name ?? '', content: message.content };
    case 'tool':
      return { role: 'tool', tool_call_id: message.tool_call_id ?? '', content: message.content };
    case 'system':
      return { role: 'system', content: message.content, ...name };
    case 'developer':
      return { role: 'developer', content: message.content, ...name };
    case 'assistant':
      return { role: 'assistant', content: message.content, ...name };
    case 'user':
      return { role: 'user', content: message.content, ...name };
  }
}

/**
 * Wrap an SDK error into an UpstreamError, keeping the HTTP status when known.
 */
function wrapError(error: unknown): UpstreamError {
  if (error instanceof RateLimitError) {
    return new UpstreamError(`Rate limited by upstream: ${error.message}`, error.status);
  }

  if (error instanceof AuthenticationError) {
    return new UpstreamError(`Upstream authentication failed: ${error.message}`, error.status);
  }

  if (error instanceof APIConnectionError) {
    return new UpstreamError(`Network error connecting to upstream: ${error.message}`);
  }

  if (error instanceof APIError) {
    const statusCode = error.status;
    return new UpstreamError(`Upstream API error (${statusCode ?? 'unknown'}): ${error.message}`, statusCode);
  }

  if (error instanceof Error) {
    return new UpstreamError(`Upstream unexpected error: ${error.message}`);
  }

  return new UpstreamError(`Upstream unknown error: ${String(error)}`);
}

/**
 * Chat completion client backed by the official SDK.
 * A single SDK client serves every caller; each request carries the caller's
 * own credential. Retries are disabled so a request is dispatched at most once.
 */
export class OpenAIUpstream implements CompletionUpstream {
  private readonly client: OpenAI;

  constructor(config: OpenAIUpstreamConfig = {}) {
    this.client = new OpenAI({
      // Replaced per request by the caller's Authorization header.
      apiKey: 'caller-supplied',
      maxRetries: 0,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
      ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
    });
    upstreamLogger.info(
      { baseUrl: config.baseUrl ?? 'default', timeoutMs: config.timeoutMs },
      'OpenAI upstream initialized',
    );
  }

  /**
   * Send a non-streaming chat completion request.
   * @throws UpstreamError for any SDK or transport failure
   */
  async complete(request: ChatRequest, apiKey: string): Promise<UpstreamCompletion> {
    try {
      return await this.client.chat.completions.create({
        model: request.model,
        messages: request.messages.map(toOpenAIMessage),
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
        ...(request.max_tokens !== undefined ? { max_tokens: request.max_tokens } : {}),
        ...(request.n !== undefined ? { n: request.n } : {}),
        ...(request.stop !== undefined ? { stop: request.stop } : {}),
        ...(request.presence_penalty !== undefined ? { presence_penalty: request.presence_penalty } : {}),
        ...(request.frequency_penalty !== undefined ? { frequency_penalty: request.frequency_penalty } : {}),
        ...(request.user !== undefined ? { user: request.user } : {}),
        ...(request.functions !== undefined ? { functions: request.functions } : {}),
        ...(request.function_call !== undefined ? { function_call: request.function_call } : {}),
        stream: false,
      }, {
        headers: { Authorization: `Bearer ${apiKey}` },
      });
    } catch (error: unknown) {
      throw wrapError(error);
    }
  }
}
