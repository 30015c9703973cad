import { z } from "zod";
import { describeError } from "./errors.js";
import { EXIT_CODES, type EmailJob, type FeedJob, type FetchOutcome, type Notification } from "./types.js";

const PREVIEW_LENGTH = 1000;

const feedJobSchema = z.object({
  id: z.string(),
  title: z.string(),
  ciphertext: z.string().optional(),
});

const jobsFeedResponseSchema = z.object({
  data: z.object({
    mostRecentJobsFeed: z.object({
      results: z.array(z.unknown()),
    }),
  }),
});

export interface NotificationContext {
  from: string;
  to: string;
  now: Date;
}

export interface ParsedPayload {
  pretty: string;
  data: unknown;
  valid: boolean;
}

/** `YYYYMMDDTHHMMSSZ` in UTC. */
export function formatCompactTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
}

export function parsePayload(body: string): ParsedPayload {
  try {
    const data: unknown = JSON.parse(body);
    return { pretty: JSON.stringify(data, null, 2), data, valid: true };
  } catch {
    return { pretty: body, data: undefined, valid: false };
  }
}

/** Length of `data.mostRecentJobsFeed.results`, or 0 when the path is absent. */
export function countResults(payload: unknown): number {
  const parsed = jobsFeedResponseSchema.safeParse(payload);
  return parsed.success ? parsed.data.data.mostRecentJobsFeed.results.length : 0;
}

export function extractJobs(payload: unknown): FeedJob[] {
  const parsed = jobsFeedResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return [];
  }
  const jobs: FeedJob[] = [];
  for (const result of parsed.data.data.mostRecentJobsFeed.results) {
    const job = feedJobSchema.safeParse(result);
    if (job.success) {
      jobs.push(job.data);
    }
  }
  return jobs;
}

/**
 * Maps a fetch outcome to the single email the run sends and the exit codes
 * that go with it.
 */
export function buildNotification(outcome: FetchOutcome, context: NotificationContext): Notification {
  const email = (subject: string, text: string): EmailJob => ({
    from: context.from,
    to: context.to,
    subject,
    text,
    date: context.now,
  });

  switch (outcome.kind) {
    case "success": {
      const ts = formatCompactTimestamp(context.now);
      const filename = `upwork_feed_${ts}.json`;
      const payload = parsePayload(outcome.body);
      const count = countResults(payload.data);
      const text = [
        "Upwork API call succeeded.",
        "",
        `Time (UTC): ${ts}`,
        `HTTP Status: ${outcome.status}`,
        "",
        `Attached: ${filename}`,
        "",
        `(First ${PREVIEW_LENGTH} chars of payload below)`,
        "",
        Array.from(payload.pretty).slice(0, PREVIEW_LENGTH).join(""),
      ].join("\n");

      return {
        branch: outcome.kind,
        email: {
          ...email(`[Upwork] mostRecentJobsFeed — ${count} results — ${ts}`, text),
          attachment: {
            filename,
            content: Buffer.from(payload.pretty, "utf8"),
            contentType: "application/json",
          },
        },
        exitCode: EXIT_CODES.ok,
        exitCodeOnSendFailure: EXIT_CODES.failure,
      };
    }
    case "auth-error":
      return {
        branch: outcome.kind,
        email: email(
          `[Upwork Fetcher] AUTH ERROR ${outcome.status}`,
          `Upwork API returned ${outcome.status}. Response:\n\n${outcome.body}`,
        ),
        exitCode: EXIT_CODES.authError,
        exitCodeOnSendFailure: EXIT_CODES.authError,
      };
    case "http-error":
      return {
        branch: outcome.kind,
        email: email(
          `[Upwork Fetcher] ERROR ${outcome.status}`,
          `Status: ${outcome.status}\n\n${outcome.body}`,
        ),
        exitCode: EXIT_CODES.httpError,
        exitCodeOnSendFailure: EXIT_CODES.httpError,
      };
    case "transport-failure":
      return {
        branch: outcome.kind,
        email: email(
          `[Upwork Fetcher] ERROR at ${context.now.toISOString()}`,
          `Failed to fetch Upwork API: ${describeError(outcome.error)}`,
        ),
        exitCode: EXIT_CODES.failure,
        exitCodeOnSendFailure: EXIT_CODES.failure,
      };
  }
}
