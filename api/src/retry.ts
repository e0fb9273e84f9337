import type { Logger } from "pino";
import { errorMessage } from "./errors.js";

export type RetryPolicy = {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  isRetryable: (error: unknown) => boolean;
};

export type RetryContext = {
  logger?: Logger;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
};

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  multiplier: 2,
  isRetryable: () => true,
};

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...defaultRetryPolicy, ...overrides };
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * policy.multiplier ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Runs `fn` until it resolves, the error is not retryable, or the attempt
 * budget is spent. The last error is rethrown.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  context: RetryContext = {},
): Promise<T> {
  if (policy.maxAttempts < 1) {
    throw new Error("maxAttempts must be at least 1");
  }
  const sleep = context.sleep ?? delay;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }
      const waitMs = backoffDelay(policy, attempt);
      context.logger?.warn(
        { attempt, maxAttempts: policy.maxAttempts, waitMs, err: errorMessage(error) },
        `${context.label ?? "operation"} failed, retrying`,
      );
      await sleep(waitMs);
    }
  }
}
