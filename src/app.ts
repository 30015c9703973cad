import { loadConfig, type AppConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { fetchJobsFeed, type FetchFn } from "./fetcher.js";
import { createLogger, type AppLogger } from "./logger.js";
import { createMailer, type Mailer } from "./mailer.js";
import { deliverNotification } from "./notifier.js";
import { buildNotification, extractJobs, parsePayload } from "./report.js";
import { sleep, type RetryPolicy, type Sleep } from "./retry.js";
import { EXIT_CODES, type ExitCode, type FetchOutcome } from "./types.js";

const LOGGED_BODY_LENGTH = 500;

export interface RunDeps {
  fetch: FetchFn;
  sleep: Sleep;
  now: () => Date;
  mailer: Mailer;
  logger: AppLogger;
  policy?: RetryPolicy;
}

/**
 * One run: fetch the feed, log the outcome, send exactly one email about it.
 */
export async function runFetchAndNotify(config: AppConfig, deps: RunDeps): Promise<ExitCode> {
  const { logger } = deps;

  logger.info(`Fetching Upwork feed (limit=${config.upwork.limit})`);
  const outcome = await fetchJobsFeed(config, deps);
  logOutcome(outcome, logger);

  const notification = buildNotification(outcome, {
    from: config.mail.from,
    to: config.mail.to,
    now: deps.now(),
  });
  const exitCode = await deliverNotification(notification, deps.mailer, logger);

  if (exitCode === EXIT_CODES.ok) {
    logger.info("Done.");
  }
  return exitCode;
}

function logOutcome(outcome: FetchOutcome, logger: AppLogger): void {
  switch (outcome.kind) {
    case "success": {
      logger.info(`Received status ${outcome.status}`);
      const payload = parsePayload(outcome.body);
      if (!payload.valid) {
        logger.warn("Response body is not valid JSON; attaching it as received");
        return;
      }
      const jobs = extractJobs(payload.data);
      logger.info(`Fetched ${jobs.length} jobs`);
      for (const job of jobs) {
        logger.debug(`  - ${job.title} (${job.id})`);
      }
      return;
    }
    case "auth-error":
      logger.info(`Received status ${outcome.status}`);
      logger.error(`Authorization error: ${outcome.status}`);
      return;
    case "http-error":
      logger.info(`Received status ${outcome.status}`);
      logger.error(
        `Unexpected HTTP status ${outcome.status}: ${outcome.body.slice(0, LOGGED_BODY_LENGTH)}`,
      );
      return;
    case "transport-failure":
      logger.error("Failed to fetch Upwork feed", outcome.error);
      return;
  }
}

/**
 * Validates configuration before anything touches the network, then runs.
 * Anything not supplied in `overrides` is built from the configuration.
 */
export async function main(
  env: NodeJS.ProcessEnv,
  overrides: Partial<RunDeps> = {},
): Promise<ExitCode> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      (overrides.logger ?? createLogger()).error(error.message, {
        missing: error.missing,
        invalid: error.invalid,
      });
      return EXIT_CODES.configurationMissing;
    }
    throw error;
  }

  return runFetchAndNotify(config, {
    fetch: overrides.fetch ?? fetch,
    sleep: overrides.sleep ?? sleep,
    now: overrides.now ?? (() => new Date()),
    mailer: overrides.mailer ?? createMailer(config.mail),
    logger: overrides.logger ?? createLogger({ level: config.log.level, logPath: config.log.path }),
    policy: overrides.policy,
  });
}
