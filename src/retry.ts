import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  backoffBase: number;
  /** Length of one backoff unit in milliseconds. */
  unitMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  backoffBase: 2,
  unitMs: 1000,
};

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

/** `backoffBase ^ attempt` units; attempt 1 waits 2s under the default policy. */
export function backoffDelayMs(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  return policy.backoffBase ** attempt * policy.unitMs;
}
