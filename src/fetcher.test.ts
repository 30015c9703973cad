import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config.js";
import { MaxRetriesExceededError } from "./errors.js";
import { classifyResponse, fetchJobsFeed, type FetchFn } from "./fetcher.js";
import { MOST_RECENT_JOBS_FEED_QUERY } from "./query.js";
import type { Sleep } from "./retry.js";

const config = loadConfig({
  UPWORK_TOKEN: "test-token",
  UPWORK_TENANTID: "tenant-1",
  LIMIT: "5",
  RECIPIENT_EMAIL: "me@example.com",
  SENDER_EMAIL: "bot@example.com",
  SMTP_HOST: "smtp.example.com",
  SMTP_USER: "bot",
  SMTP_PASS: "test-secret",
});

describe("fetchJobsFeed", () => {
  const fetch = vi.fn<FetchFn>();
  const sleep = vi.fn<Sleep>();
  const logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
    fetch.mockReset();
    sleep.mockResolvedValue(undefined);
  });

  it("posts the feed query with the configured headers", async () => {
    fetch.mockResolvedValueOnce(new Response('{"data":{}}', { status: 200 }));

    await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://www.upwork.com/api/graphql/v1?alias=mostRecentJobsFeed");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      Authorization: "Bearer test-token",
      "Content-Type": "application/json",
      "x-upwork-api-tenantid": "tenant-1",
      Referer: "https://www.upwork.com/nx/find-work/most-recent",
      Accept: "*/*",
      "User-Agent": "UpworkFetcher/1.0",
    });
    expect(JSON.parse(String(init.body))).toEqual({
      query: MOST_RECENT_JOBS_FEED_QUERY,
      variables: { limit: 5 },
    });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns a success outcome for 200", async () => {
    fetch.mockResolvedValueOnce(new Response('{"ok":true}', { status: 200 }));

    const outcome = await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(outcome).toEqual({ kind: "success", status: 200, body: '{"ok":true}' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it.each([401, 403, 404, 429, 201, 302])("does not retry status %i", async (status) => {
    fetch.mockResolvedValueOnce(new Response("nope", { status }));

    const outcome = await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(outcome).toEqual(classifyResponse(status, "nope"));
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("retries 5xx responses with exponential backoff", async () => {
    fetch
      .mockResolvedValueOnce(new Response("oops", { status: 500 }))
      .mockResolvedValueOnce(new Response("oops", { status: 502 }))
      .mockResolvedValueOnce(new Response("{}", { status: 200 }));

    const outcome = await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(outcome.kind).toBe("success");
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    expect(logger.warn).toHaveBeenNthCalledWith(1, "Server error 500. Attempt 1/3");
    expect(logger.warn).toHaveBeenNthCalledWith(2, "Server error 502. Attempt 2/3");
  });

  it("retries transport failures", async () => {
    fetch
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("forbidden", { status: 403 }));

    const outcome = await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(outcome).toEqual({ kind: "auth-error", status: 403, body: "forbidden" });
    expect(sleep.mock.calls).toEqual([[2000]]);
    expect(logger.warn).toHaveBeenCalledWith("Request failed (attempt 1/3): fetch failed");
  });

  it("gives up after three failed attempts", async () => {
    fetch.mockImplementation(async () => new Response("down", { status: 503 }));

    const outcome = await fetchJobsFeed(config, { fetch, sleep, logger });

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[2000], [4000], [8000]]);
    expect(outcome.kind).toBe("transport-failure");
    if (outcome.kind !== "transport-failure") return;
    expect(outcome.error).toBeInstanceOf(MaxRetriesExceededError);
    expect(outcome.error.message).toBe("Max retries exceeded fetching Upwork API");
    expect(outcome.error.cause).toEqual(new Error("Server error 503"));
  });

  it("honours a custom retry policy", async () => {
    fetch.mockRejectedValue(new Error("ECONNRESET"));

    const outcome = await fetchJobsFeed(config, {
      fetch,
      sleep,
      logger,
      policy: { maxAttempts: 2, backoffBase: 3, unitMs: 10 },
    });

    expect(outcome.kind).toBe("transport-failure");
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[30], [90]]);
  });
});

describe("classifyResponse", () => {
  it("maps statuses to outcome kinds", () => {
    expect(classifyResponse(200, "a").kind).toBe("success");
    expect(classifyResponse(401, "a").kind).toBe("auth-error");
    expect(classifyResponse(403, "a").kind).toBe("auth-error");
    expect(classifyResponse(404, "a").kind).toBe("http-error");
    expect(classifyResponse(204, "").kind).toBe("http-error");
  });
});
