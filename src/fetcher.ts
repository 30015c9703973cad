import type { AppConfig } from "./config.js";
import { MaxRetriesExceededError, describeError, toError } from "./errors.js";
import type { AppLogger } from "./logger.js";
import { buildJobsFeedRequest, buildRequestHeaders } from "./query.js";
import { DEFAULT_RETRY_POLICY, backoffDelayMs, type RetryPolicy, type Sleep } from "./retry.js";
import type { FetchOutcome } from "./types.js";

const REQUEST_TIMEOUT_MS = 20_000;

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FetcherDeps {
  fetch: FetchFn;
  sleep: Sleep;
  logger: AppLogger;
  policy?: RetryPolicy;
}

/**
 * Posts the jobs feed query, retrying transport failures and 5xx responses
 * with exponential backoff. Every other status is returned on the attempt
 * that produced it. Never throws: exhaustion comes back as a
 * `transport-failure` outcome.
 */
export async function fetchJobsFeed(config: AppConfig, deps: FetcherDeps): Promise<FetchOutcome> {
  const policy = deps.policy ?? DEFAULT_RETRY_POLICY;
  const init = {
    method: "POST",
    headers: buildRequestHeaders(config.upwork),
    body: JSON.stringify(buildJobsFeedRequest(config.upwork.limit)),
  };

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const response = await deps.fetch(config.upwork.apiUrl, {
        ...init,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (response.status < 500) {
        return classifyResponse(response.status, await response.text());
      }

      lastError = new Error(`Server error ${response.status}`);
      deps.logger.warn(
        `Server error ${response.status}. Attempt ${attempt}/${policy.maxAttempts}`,
      );
    } catch (error) {
      lastError = toError(error);
      deps.logger.warn(
        `Request failed (attempt ${attempt}/${policy.maxAttempts}): ${describeError(error)}`,
      );
    }

    await deps.sleep(backoffDelayMs(attempt, policy));
  }

  return {
    kind: "transport-failure",
    error: new MaxRetriesExceededError(policy.maxAttempts, lastError),
  };
}

export function classifyResponse(status: number, body: string): FetchOutcome {
  if (status === 200) {
    return { kind: "success", status, body };
  }
  if (status === 401 || status === 403) {
    return { kind: "auth-error", status, body };
  }
  return { kind: "http-error", status, body };
}
