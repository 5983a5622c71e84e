/**
 * quota-gate error type hierarchy.
 * All custom errors extend QuotaGateError, which carries a machine-readable
 * code and the HTTP status the gateway answers with.
 */

/** Machine-readable discriminator carried by every QuotaGateError */
export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'PRICING_LOAD_FAILED'
  | 'UNAUTHORIZED'
  | 'MODEL_NOT_ALLOWED'
  | 'MALFORMED_REQUEST'
  | 'BUDGET_EXHAUSTED'
  | 'BUDGET_WOULD_BE_EXCEEDED'
  | 'UPSTREAM_FAILURE'
  | 'LEDGER_ERROR'
  | 'LIFECYCLE_ERROR';

/** Base error for all quota-gate errors */
export class QuotaGateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = 'QuotaGateError';
  }
}

/** Thrown when config validation fails */
export class ConfigError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}

/** Thrown when the pricing source cannot be read or has too few records */
export class PricingLoadError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'PRICING_LOAD_FAILED', 500);
    this.name = 'PricingLoadError';
  }
}

/** Thrown when the caller's credential is missing or malformed */
export class UnauthorizedError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

/** Thrown when the requested model is outside the allow-list */
export class ModelNotAllowedError extends QuotaGateError {
  constructor(public readonly model: string) {
    super(`Model ${model} is not in the allowed list.`, 'MODEL_NOT_ALLOWED', 400);
    this.name = 'ModelNotAllowedError';
  }
}

/** Thrown when the request body does not have the chat-completion shape */
export class MalformedRequestError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'MALFORMED_REQUEST', 400);
    this.name = 'MalformedRequestError';
  }
}

/** Thrown when spend has already reached the ceiling */
export class BudgetExhaustedError extends QuotaGateError {
  constructor() {
    super('Global cost limit exceeded.', 'BUDGET_EXHAUSTED', 429);
    this.name = 'BudgetExhaustedError';
  }
}

/** Thrown when the prompt estimate alone would reach the ceiling */
export class BudgetWouldBeExceededError extends QuotaGateError {
  constructor(public readonly estimatedCostUsd: number) {
    super('Request would exceed global cost limit.', 'BUDGET_WOULD_BE_EXCEEDED', 429);
    this.name = 'BudgetWouldBeExceededError';
  }
}

/** Thrown when the upstream completion API call fails */
export class UpstreamError extends QuotaGateError {
  constructor(
    message: string,
    public readonly upstreamStatus?: number,
  ) {
    super(message, 'UPSTREAM_FAILURE', 500);
    this.name = 'UpstreamError';
  }
}

/** Thrown when a ledger mutation is given an invalid amount */
export class LedgerError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'LEDGER_ERROR', 500);
    this.name = 'LedgerError';
  }
}

/** Thrown on an illegal request lifecycle transition */
export class LifecycleError extends QuotaGateError {
  constructor(message: string) {
    super(message, 'LIFECYCLE_ERROR', 500);
    this.name = 'LifecycleError';
  }
}
