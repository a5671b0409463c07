import { AppError, BatchCancelledError, GatewayError } from "../lib/errors";
import { createLogger } from "../lib/logger";

const log = createLogger("retry");

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** Upper bound of the random extra delay, as a fraction of the computed delay */
  jitterRatio?: number;
  /** Longest wait before a retry. A server asking for more fails the attempt instead. */
  maxDelayMs?: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryHooks {
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (error: AppError, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 1,
  baseDelayMs: 1000,
  jitterRatio: 0.25,
  maxDelayMs: 10_000,
};

/**
 * Run `operation`, retrying only errors flagged retryable, at most
 * `policy.maxRetries` times with exponential backoff and jitter.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? abortableSleep;
  const random = hooks.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    if (hooks.signal?.aborted) {
      throw new BatchCancelledError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof AppError) || !error.retryable || attempt >= policy.maxRetries) {
        throw error;
      }

      if (exceedsMaxDelay(error, policy)) {
        log.debug(`Server asked to wait longer than ${policy.maxDelayMs}ms (${error.code}), not retrying`);
        throw error;
      }

      const delayMs = computeDelay(error, attempt, policy, random);
      log.debug(`Attempt ${attempt + 1} failed (${error.code}), retrying in ${delayMs}ms`);
      hooks.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, hooks.signal);
    }
  }
}

export function computeDelay(
  error: AppError,
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const backoff = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = backoff * (policy.jitterRatio ?? 0) * random();
  const delay = Math.min(Math.round(backoff + jitter), policy.maxDelayMs ?? Number.POSITIVE_INFINITY);

  if (error instanceof GatewayError && error.retryAfterMs !== null) {
    return Math.max(delay, error.retryAfterMs);
  }
  return delay;
}

function exceedsMaxDelay(error: AppError, policy: RetryPolicy): boolean {
  return (
    policy.maxDelayMs !== undefined &&
    error instanceof GatewayError &&
    error.retryAfterMs !== null &&
    error.retryAfterMs > policy.maxDelayMs
  );
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new BatchCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new BatchCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
