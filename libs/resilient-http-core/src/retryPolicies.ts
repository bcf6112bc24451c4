import type { RetryContext, RetryDecision, RetryPolicy } from './types';

const DEFAULT_MAX_ATTEMPTS = 4;
const DEFAULT_BASE_BACKOFF_MS = 250;
const DEFAULT_LINEAR_BACKOFF_MS = 1_000;
const MAX_RETRY_DELAY_MS = 60_000;

const NO_RETRY: RetryDecision = { retry: false, delayMs: 0 };

export interface ExponentialRetryOptions {
  maxAttempts?: number;          // Default: 4 (one try plus three retries)
  baseBackoffMs?: number;        // Default: 250
  maxBackoffMs?: number;         // Default: 60_000
  jitterFactorRange?: [number, number]; // Default: [0.8, 1.2]
}

export interface LinearRetryOptions {
  maxAttempts?: number;
  deltaBackoffMs?: number;       // Default: 1_000
}

const canRetry = (ctx: RetryContext): boolean =>
  ctx.attempt < ctx.maxAttempts && ctx.classified.fallback?.retryable === true;

const suggestedDelay = (ctx: RetryContext): number | undefined => {
  const retryAfterMs = ctx.classified.fallback?.retryAfterMs;
  return retryAfterMs !== undefined ? Math.min(retryAfterMs, MAX_RETRY_DELAY_MS) : undefined;
};

/**
 * Retries classified-retryable failures with exponential backoff and jitter.
 * A classifier-supplied `retryAfterMs` wins over the computed delay.
 */
export class ExponentialRetryPolicy implements RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly jitterFactorRange: [number, number];

  constructor(options: ExponentialRetryOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.baseBackoffMs = options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_RETRY_DELAY_MS;
    this.jitterFactorRange = options.jitterFactorRange ?? [0.8, 1.2];
  }

  evaluate(ctx: RetryContext): RetryDecision {
    if (!canRetry(ctx)) return NO_RETRY;

    const suggested = suggestedDelay(ctx);
    if (suggested !== undefined) {
      return { retry: true, delayMs: suggested };
    }

    const [minJitter, maxJitter] = this.jitterFactorRange;
    const baseDelay = this.baseBackoffMs * 2 ** (ctx.attempt - 1);
    const jitterFactor = minJitter + Math.random() * (maxJitter - minJitter);
    return { retry: true, delayMs: Math.min(baseDelay * jitterFactor, this.maxBackoffMs) };
  }
}

export class LinearRetryPolicy implements RetryPolicy {
  readonly maxAttempts: number;
  private readonly deltaBackoffMs: number;

  constructor(options: LinearRetryOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.deltaBackoffMs = options.deltaBackoffMs ?? DEFAULT_LINEAR_BACKOFF_MS;
  }

  evaluate(ctx: RetryContext): RetryDecision {
    if (!canRetry(ctx)) return NO_RETRY;
    return { retry: true, delayMs: suggestedDelay(ctx) ?? this.deltaBackoffMs };
  }
}

export const noRetryPolicy: RetryPolicy = {
  maxAttempts: 1,
  evaluate: () => NO_RETRY,
};
