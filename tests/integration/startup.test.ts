/**
 * Integration tests for application startup wiring.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { startApp, type AppContext } from '../../src/index.js';
import { ConfigSchema } from '../../src/config/schema.js';
import { FALLBACK_ALLOWED_MODELS } from '../../src/cost/allow-list.js';
import { MockUpstream, charTokenizer, makeCompletion, makeUsage } from '../mocks/upstream.js';

describe('startApp', () => {
  let app: AppContext | undefined;

  afterEach(async () => {
    await app?.shutdownHandler.shutdown();
    app = undefined;
  });

  it('loads the bundled pricing and derives the allow-list', async () => {
    app = await startApp({
      config: ConfigSchema.parse({}),
      upstream: new MockUpstream(),
      skipGatewayListen: true,
      skipSignalHandlers: true,
    });

    expect(app.catalog.get('gpt-4o')?.inputRate).toBe(2.5);
    expect(app.controller.allowedModels).toEqual([
      'gpt-3.5-turbo',
      'gpt-4-1106-preview',
      'gpt-4.1',
      'gpt-4o',
      'o3',
      'o4-mini',
    ]);
    expect(await app.ledger.snapshot()).toEqual({ ceiling: 2, totalSpent: 0, remaining: 2 });
  });

  it('prefers configured model prefixes', async () => {
    app = await startApp({
      config: ConfigSchema.parse({ allowedModelPrefixes: ['o3'] }),
      upstream: new MockUpstream(),
      skipGatewayListen: true,
      skipSignalHandlers: true,
    });

    expect(app.controller.allowedModels).toEqual(['o3']);
  });

  it('continues with an empty catalog when pricing cannot be loaded', async () => {
    app = await startApp({
      config: ConfigSchema.parse({ pricingFile: '/nonexistent/pricing.csv' }),
      upstream: new MockUpstream(),
      skipGatewayListen: true,
      skipSignalHandlers: true,
    });

    expect(app.catalog.size).toBe(0);
    expect(app.controller.allowedModels).toEqual([...FALLBACK_ALLOWED_MODELS]);
  });

  it('serves requests end to end through the gateway', async () => {
    const upstream = new MockUpstream().respondWith(makeCompletion('ok', makeUsage(1000, 1000)));
    app = await startApp({
      config: ConfigSchema.parse({ ceilingUsd: 1 }),
      upstream,
      tokenizer: charTokenizer,
      skipGatewayListen: true,
      skipSignalHandlers: true,
    });

    const response = await app.gateway.app.inject({
      method: 'POST',
      url: '/v1/chat/completions',
      headers: { authorization: 'Bearer sk-test-key' },
      payload: { model: 'gpt-4o-2024-08-06', messages: [{ role: 'user', content: 'hi' }] },
    });

    // 1000 * 2.5 / 1e6 + 1000 * 10 / 1e6
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      proxy_usage: { prompt_tokens: 1000, completion_tokens: 1000, cost_usd: 0.0125 },
    });
    expect((await app.ledger.snapshot()).totalSpent).toBeCloseTo(0.0125, 12);
  });
});
