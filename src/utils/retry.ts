import axios from "axios";
import logger from "./logger";
import { toError } from "./errors";

/**
 * Retry policy value object. Composed around each network operation
 * instead of being attached implicitly.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  readonly isRetryable: (error: Error) => boolean;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Transient transport failure: no response at all (timeout, reset, DNS)
 * or a 5xx response. Everything else is the caller's problem.
 */
export function isTransientHttpError(error: Error): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  if (!error.response) {
    return true;
  }
  return error.response.status >= 500;
}

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return {
    maxAttempts: 3,
    initialDelayMs: 2000,
    maxDelayMs: 30000,
    multiplier: 2,
    isRetryable: isTransientHttpError,
    ...overrides,
  };
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `fn` under the policy. Non-retryable errors propagate unchanged on
 * the first failure; retryable ones are wrapped in RetryExhaustedError once
 * the last attempt fails.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  label: string,
  fn: (attempt: number) => Promise<T>,
): Promise<T> {
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (!policy.isRetryable(lastError)) {
        throw lastError;
      }

      logger.warn(
        `Attempt ${attempt}/${policy.maxAttempts} failed for ${label}: ${lastError.message}`,
      );

      if (attempt < policy.maxAttempts) {
        const delay = backoffDelay(policy, attempt);
        logger.debug(`Retrying ${label} in ${delay}ms...`);
        await sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(
    policy.maxAttempts,
    lastError ?? new Error("Unknown error"),
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
