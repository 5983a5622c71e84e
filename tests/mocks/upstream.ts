/**
 * Test doubles for the upstream completion API and tokenizer.
 */

import type { Tokenizer } from '../../src/cost/tokens.js';
import type { ChatRequest, CompletionUpstream, CompletionUsage, UpstreamCompletion } from '../../src/types/index.js';

/** Counts one token per character, so expected values are easy to derive */
export const charTokenizer: Tokenizer = {
  countTokens: (text: string) => text.length,
};

/** Build a completion with a single assistant choice */
export function makeCompletion(content: string | null, usage?: CompletionUsage): UpstreamCompletion {
  return {
    id: 'chatcmpl-test-1',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'gpt-4o',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    ...(usage ? { usage } : {}),
  };
}

export function makeUsage(promptTokens: number, completionTokens: number): CompletionUsage {
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}

interface RecordedCall {
  request: ChatRequest;
  apiKey: string;
}

/**
 * Upstream that answers from a queue of responders.
 * Without queued responders it returns a fixed completion.
 */
export class MockUpstream implements CompletionUpstream {
  readonly calls: RecordedCall[] = [];
  private readonly responders: Array<(request: ChatRequest) => Promise<UpstreamCompletion>> = [];

  constructor(private readonly fallback: UpstreamCompletion = makeCompletion('Hello!', makeUsage(10, 5))) {}

  /** Queue a response for the next call */
  respondWith(completion: UpstreamCompletion): this {
    this.responders.push(async () => completion);
    return this;
  }

  /** Queue a failure for the next call */
  failWith(error: Error): this {
    this.responders.push(async () => {
      throw error;
    });
    return this;
  }

  /** Queue a response the test resolves manually */
  deferred(): { resolve: (completion: UpstreamCompletion) => void } {
    let resolve: (completion: UpstreamCompletion) => void = () => undefined;
    const pending = new Promise<UpstreamCompletion>((res) => {
      resolve = res;
    });
    this.responders.push(() => pending);
    return { resolve: (completion) => resolve(completion) };
  }

  async complete(request: ChatRequest, apiKey: string): Promise<UpstreamCompletion> {
    this.calls.push({ request, apiKey });
    const responder = this.responders.shift();
    return responder ? responder(request) : this.fallback;
  }
}
