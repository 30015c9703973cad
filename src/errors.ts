export type ErrorCode =
  | "CONFIGURATION_MISSING"
  | "CONFIGURATION_INVALID"
  | "MAX_RETRIES_EXCEEDED"
  | "NOTIFICATION_SEND_FAILED";

interface AppErrorOptions {
  code: ErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options: AppErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.details = options.details;
  }
}

export class ConfigurationError extends AppError {
  public readonly missing: string[];
  public readonly invalid: string[];

  constructor(missing: string[], invalid: string[]) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`Missing environment variables: ${missing.join(", ")}`);
    }
    if (invalid.length > 0) {
      parts.push(`Invalid environment variables: ${invalid.join(", ")}`);
    }
    super(parts.join("; "), {
      code: missing.length > 0 ? "CONFIGURATION_MISSING" : "CONFIGURATION_INVALID",
      details: { missing, invalid },
    });
    this.missing = missing;
    this.invalid = invalid;
  }
}

export class MaxRetriesExceededError extends AppError {
  public readonly attempts: number;

  constructor(attempts: number, lastError?: unknown) {
    super("Max retries exceeded fetching Upwork API", {
      code: "MAX_RETRIES_EXCEEDED",
      details: { attempts },
      cause: lastError,
    });
    this.attempts = attempts;
  }
}

export class NotificationSendError extends AppError {
  constructor(recipient: string, cause: unknown) {
    super(`Failed to send email to ${recipient}: ${describeError(cause)}`, {
      code: "NOTIFICATION_SEND_FAILED",
      cause,
    });
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One-line description of an error and, if present, the error that caused it.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const description = error.message || error.name;
  if (error.cause === undefined) {
    return description;
  }
  return `${description} (caused by: ${describeError(error.cause)})`;
}
