/**
 * Admission controller.
 * Gates, authorizes, validates and prices each chat request, forwards it
 * upstream, then reconciles the provider's usage into the budget ledger.
 * Ledger checks and commits are serialized; the upstream call is not, so
 * requests admitted concurrently may together overshoot the ceiling.
 */

import { nanoid } from 'nanoid';
import {
  BudgetExhaustedError,
  BudgetWouldBeExceededError,
  ModelNotAllowedError,
  QuotaGateError,
  UpstreamError,
} from '../errors.js';
import { calculateCost, roundUsd } from '../cost/calculator.js';
import type { PriceCatalog, PriceEntry } from '../cost/pricing.js';
import { isModelAllowed } from '../cost/allow-list.js';
import { countCompletionTokens, countMessageTokens, tiktokenTokenizer, type Tokenizer } from '../cost/tokens.js';
import type { BudgetLedger } from '../ledger/ledger.js';
import { admissionLogger } from '../utils/logger.js';
import type {
  ChatRequest,
  CompletionUpstream,
  ProxiedCompletion,
  ProxyUsage,
  StatusSnapshot,
  UpstreamCompletion,
} from '../types/index.js';
import { RequestLifecycle, type LifecycleState } from './lifecycle.js';
import { parseBearerToken, parseChatRequest } from './request.js';

export interface AdmissionControllerDeps {
  catalog: PriceCatalog;
  ledger: BudgetLedger;
  upstream: CompletionUpstream;
  allowList: readonly string[];
  tokenizer?: Tokenizer;
}

export interface AdmissionInput {
  /** Raw Authorization header value */
  authorization: string | undefined;
  /** Raw JSON text or a decoded body */
  body: unknown;
  /** Correlation id for logs; generated when absent */
  requestId?: string;
}

export interface AdmissionResult {
  response: ProxiedCompletion;
  usage: ProxyUsage;
  /** Total spend after this request was committed */
  totalSpent: number;
  lifecycle: readonly LifecycleState[];
}

interface Estimate {
  promptTokens: number;
  estimatedCost: number;
}

export class AdmissionController {
  private readonly catalog: PriceCatalog;
  private readonly ledger: BudgetLedger;
  private readonly upstream: CompletionUpstream;
  private readonly allowList: readonly string[];
  private readonly tokenizer: Tokenizer;

  constructor(deps: AdmissionControllerDeps) {
    this.catalog = deps.catalog;
    this.ledger = deps.ledger;
    this.upstream = deps.upstream;
    this.allowList = [...deps.allowList];
    this.tokenizer = deps.tokenizer ?? tiktokenTokenizer;
  }

  /** Models a request may name, as prefixes */
  get allowedModels(): readonly string[] {
    return this.allowList;
  }

  /**
   * Run one request through admission, dispatch and reconciliation.
   * Rejections and upstream failures throw a QuotaGateError and leave the
   * ledger untouched.
   */
  async handle(input: AdmissionInput): Promise<AdmissionResult> {
    const lifecycle = new RequestLifecycle();
    const log = admissionLogger.child({ requestId: input.requestId ?? nanoid(10) });

    try {
      await this.assertNotExhausted();

      const apiKey = parseBearerToken(input.authorization);
      lifecycle.advance('authorized');

      const request = this.validate(input.body);
      const estimate = this.estimate(request);
      await this.admit(request, estimate);
      lifecycle.advance('admitted');

      log.debug({ model: request.model, ...estimate }, 'Request admitted');
      lifecycle.advance('dispatched');

      const completion = await this.dispatch(request, apiKey, estimate);
      const usage = this.reconcile(request, completion);
      const totalSpent = await this.ledger.commit(usage.cost_usd);
      lifecycle.advance('reconciled');

      log.info(
        {
          model: request.model,
          promptTokens: usage.prompt_tokens,
          completionTokens: usage.completion_tokens,
          costUsd: roundUsd(usage.cost_usd),
          totalSpent: roundUsd(totalSpent),
          remaining: roundUsd(this.ledger.ceiling - totalSpent),
        },
        'Request completed',
      );

      const reported: ProxyUsage = { ...usage, cost_usd: roundUsd(usage.cost_usd) };
      return {
        response: { ...completion, proxy_usage: reported },
        usage: reported,
        totalSpent,
        lifecycle: lifecycle.history,
      };
    } catch (error: unknown) {
      if (!lifecycle.isTerminal) {
        lifecycle.advance(lifecycle.state === 'dispatched' ? 'failed' : 'rejected');
      }
      if (error instanceof QuotaGateError) {
        log.info({ code: error.code, state: lifecycle.history }, error.message);
      }
      throw error;
    }
  }

  /** Current budget and catalog summary */
  async status(): Promise<StatusSnapshot> {
    const snapshot = await this.ledger.snapshot();
    return {
      ceiling: snapshot.ceiling,
      totalSpent: snapshot.totalSpent,
      remaining: snapshot.remaining,
      models: this.catalog.keys(),
      modelsCount: this.catalog.size,
    };
  }

  /** Pricing keyed by catalog key */
  pricing(): Record<string, PriceEntry> {
    return this.catalog.toJSON();
  }

  private async assertNotExhausted(): Promise<void> {
    const exhausted = await this.ledger.withLock((view) => view.isExhausted());
    if (exhausted) {
      throw new BudgetExhaustedError();
    }
  }

  private validate(body: unknown): ChatRequest {
    const request = parseChatRequest(body);
    if (!isModelAllowed(request.model, this.allowList)) {
      throw new ModelNotAllowedError(request.model);
    }
    return request;
  }

  private estimate(request: ChatRequest): Estimate {
    const promptTokens = countMessageTokens(request.messages, request.model, this.tokenizer);
    const estimatedCost = calculateCost(this.catalog, request.model, promptTokens, 0);
    return { promptTokens, estimatedCost };
  }

  private async admit(request: ChatRequest, estimate: Estimate): Promise<void> {
    const verdict = await this.ledger.withLock((view) => {
      if (view.isExhausted()) {
        return 'exhausted';
      }
      if (view.wouldExceed(estimate.estimatedCost)) {
        admissionLogger.warn(
          {
            model: request.model,
            promptTokens: estimate.promptTokens,
            promptCostUsd: estimate.estimatedCost,
            totalSpent: view.totalSpent,
            ceiling: view.ceiling,
          },
          'Request would exceed global cost limit',
        );
        return 'would-exceed';
      }
      return 'admitted';
    });

    if (verdict === 'exhausted') {
      throw new BudgetExhaustedError();
    }
    if (verdict === 'would-exceed') {
      throw new BudgetWouldBeExceededError(estimate.estimatedCost);
    }
  }

  private async dispatch(request: ChatRequest, apiKey: string, estimate: Estimate): Promise<UpstreamCompletion> {
    try {
      return await this.upstream.complete(request, apiKey);
    } catch (error: unknown) {
      const wrapped = error instanceof UpstreamError
        ? error
        : new UpstreamError(`OpenAI API call error: ${error instanceof Error ? error.message : String(error)}`);
      admissionLogger.error(
        {
          model: request.model,
          promptTokens: estimate.promptTokens,
          estimatedCostUsd: estimate.estimatedCost,
          error: wrapped.message,
        },
        'Upstream call failed, nothing charged',
      );
      throw wrapped;
    }
  }

  /**
   * Derive final token counts and cost.
   * Reported usage is used when both counts are positive; otherwise both are
   * recounted locally from the request and the returned choices.
   */
  private reconcile(request: ChatRequest, completion: UpstreamCompletion): ProxyUsage {
    const reportedPrompt = completion.usage?.prompt_tokens ?? 0;
    const reportedCompletion = completion.usage?.completion_tokens ?? 0;

    let promptTokens = reportedPrompt;
    let completionTokens = reportedCompletion;
    if (reportedPrompt <= 0 || reportedCompletion <= 0) {
      promptTokens = countMessageTokens(request.messages, request.model, this.tokenizer);
      completionTokens = countCompletionTokens(completion.choices, request.model, this.tokenizer);
      admissionLogger.debug(
        { model: request.model, promptTokens, completionTokens },
        'Upstream usage missing, counted locally',
      );
    }

    return {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      cost_usd: calculateCost(this.catalog, request.model, promptTokens, completionTokens),
    };
  }
}
