/**
 * Retry-on-throttle with exponential backoff
 */

import { z } from 'zod';
import { isThrottled } from './errors.js';
import type { RetryPolicy } from './types.js';

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  initialDelayMs: z.number().finite().min(0),
  backoffMultiplier: z.number().finite().min(1),
});

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 4,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
});

/**
 * Build a validated, frozen policy from partial overrides
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const given = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = RetryPolicySchema.safeParse({ ...DEFAULT_RETRY_POLICY, ...given });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid retry policy: ${details.join('; ')}`);
  }
  return Object.freeze(parsed.data);
}

export interface RetryHooks {
  /** Called before each backoff sleep */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run operation, retrying throttled failures.
 *
 * Up to maxAttempts - 1 guarded attempts sleep and retry on throttle; the
 * final attempt is unguarded and whatever it throws reaches the caller.
 * Non-throttle errors are never retried.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  let delayMs = policy.initialDelayMs;

  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isThrottled(error)) {
        throw error;
      }
      hooks.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
      delayMs *= policy.backoffMultiplier;
    }
  }

  return operation();
}
