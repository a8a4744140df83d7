import { ExecutionAbortedError, RateLimitError, RequestError } from './errors.js';

/**
 * RETRY MANAGER - bounded retries with exponential backoff for provider calls.
 * Only rate-limit and provider (5xx/network) failures are retried.
 */

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterEnabled: boolean;
}

export interface RetryDecision {
  shouldRetry: boolean;
  waitMs: number;
  reason: string;
}

export interface RetryEvent {
  attempt: number;
  waitMs: number;
  reason: string;
  error: RequestError;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterEnabled: true,
};

export const sleep: Sleeper = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ExecutionAbortedError('Aborted while waiting to retry', { cause: signal.reason }));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ExecutionAbortedError('Aborted while waiting to retry', { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryManager {
  private readonly policy: RetryPolicy;

  constructor(policy: Partial<RetryPolicy> = {}, private readonly sleeper: Sleeper = sleep) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.policy.maxAttempts = Math.max(1, this.policy.maxAttempts);
  }

  /** A manager that makes exactly one attempt. */
  static none(): RetryManager {
    return new RetryManager({ maxAttempts: 1 });
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  getDecision(attempt: number, error: unknown): RetryDecision {
    if (!(error instanceof RequestError) || !error.retryable) {
      return { shouldRetry: false, waitMs: 0, reason: 'not_retryable' };
    }
    if (attempt >= this.policy.maxAttempts) {
      return { shouldRetry: false, waitMs: 0, reason: 'attempts_exhausted' };
    }
    if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
      return {
        shouldRetry: true,
        waitMs: Math.min(Math.max(0, error.retryAfterMs), this.policy.maxDelayMs),
        reason: 'retry_after',
      };
    }
    return {
      shouldRetry: true,
      waitMs: this.calculateRetryDelay(attempt),
      reason: error instanceof RateLimitError ? 'rate_limited' : 'provider_error',
    };
  }

  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const decision = this.getDecision(attempt, error);
        if (!decision.shouldRetry || !(error instanceof RequestError)) {
          throw error;
        }
        options.onRetry?.({ attempt, waitMs: decision.waitMs, reason: decision.reason, error });
        await this.sleeper(decision.waitMs, options.signal);
      }
    }
  }

  /**
   * Calculate retry delay with exponential backoff and jitter
   */
  private calculateRetryDelay(attempt: number): number {
    const policy = this.policy;
    let delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, policy.maxDelayMs);

    if (policy.jitterEnabled) {
      // ±25% jitter
      const jitter = delay * 0.25;
      delay = delay + (Math.random() * 2 - 1) * jitter;
    }

    return Math.max(0, Math.floor(delay));
  }
}
