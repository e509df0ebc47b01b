import { classifyFailure, ExhaustedRetriesError, type FailureKind } from '../errors';
import { logger, serializeError } from '../logger';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction applied as `delay * (1 ± jitter)`; 0 disables jitter. */
  jitter: number;
};

export type RetryHooks = {
  classify?: (error: unknown) => FailureKind;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

export type RetryExecutorOptions = {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitter: 0.1,
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (attempt: number, policy: RetryPolicy, randomValue: number): number => {
  const exponentialDelay = policy.baseDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(policy.maxDelayMs, exponentialDelay);
  const spread = policy.jitter * (randomValue * 2 - 1);

  return Math.max(0, Math.round(cappedDelay * (1 + spread)));
};

export class RetryExecutor {
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly random: () => number;

  constructor({ sleep = wait, random = Math.random }: RetryExecutorOptions = {}) {
    this.sleep = sleep;
    this.random = random;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    policy: Partial<RetryPolicy> = {},
    hooks: RetryHooks = {},
  ): Promise<T> {
    const resolved: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
    const maxAttempts = Math.max(1, Math.trunc(resolved.maxAttempts));
    const classify = hooks.classify ?? classifyFailure;

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (classify(error) === 'permanent') {
          throw error;
        }

        lastError = error;

        if (attempt === maxAttempts) {
          break;
        }

        const delay = computeDelay(attempt, resolved, this.random());

        if (hooks.onRetry) {
          try {
            hooks.onRetry(error, attempt, delay);
          } catch (hookError) {
            logger.warn({ err: serializeError(hookError) }, 'Retry hook threw an error.');
          }
        }

        await this.sleep(delay);
      }
    }

    throw new ExhaustedRetriesError(maxAttempts, lastError);
  }
}
