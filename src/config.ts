import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_API_URL = "https://www.upwork.com/api/graphql/v1?alias=mostRecentJobsFeed";
export const DEFAULT_LOG_PATH = "/var/log/upwork_fetcher.log";

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const required = z.preprocess(blankToUndefined, z.string());

const envSchema = z.object({
  API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_API_URL)),
  UPWORK_TOKEN: required,
  UPWORK_TENANTID: required,
  LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(10)),
  RECIPIENT_EMAIL: required,
  SENDER_EMAIL: required,
  LOG_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_LOG_PATH)),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["error", "warn", "info", "debug"]).default("info"),
  ),
});

const mailTransportSchema = z.preprocess(
  blankToUndefined,
  z.enum(["smtp", "resend"]).default("smtp"),
);

const smtpSchema = z.object({
  SMTP_HOST: required,
  SMTP_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(587)),
  SMTP_USER: required,
  SMTP_PASS: required,
});

const resendSchema = z.object({
  RESEND_API_KEY: required,
});

export type EnvSchema = z.infer<typeof envSchema>;
export type LogLevel = EnvSchema["LOG_LEVEL"];

export interface SmtpSettings {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly pass: string;
}

export type MailSettings =
  | { readonly transport: "smtp"; readonly smtp: SmtpSettings }
  | { readonly transport: "resend"; readonly resendApiKey: string };

export interface AppConfig {
  readonly upwork: {
    readonly apiUrl: string;
    readonly token: string;
    readonly tenantId: string;
    readonly limit: number;
  };
  readonly mail: MailSettings & {
    readonly from: string;
    readonly to: string;
  };
  readonly log: {
    readonly path: string;
    readonly level: LogLevel;
  };
}

/**
 * Validates the environment and builds the frozen run configuration.
 * Throws ConfigurationError naming every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  const base = envSchema.safeParse(env);
  if (!base.success) {
    collectIssues(base.error, missing, invalid);
  }

  let mail: MailSettings | undefined;
  const transport = mailTransportSchema.safeParse(env.MAIL_TRANSPORT);
  if (!transport.success) {
    invalid.add("MAIL_TRANSPORT");
  } else if (transport.data === "resend") {
    const parsed = resendSchema.safeParse(env);
    if (parsed.success) {
      mail = { transport: "resend", resendApiKey: parsed.data.RESEND_API_KEY };
    } else {
      collectIssues(parsed.error, missing, invalid);
    }
  } else {
    const parsed = smtpSchema.safeParse(env);
    if (parsed.success) {
      mail = {
        transport: "smtp",
        smtp: {
          host: parsed.data.SMTP_HOST,
          port: parsed.data.SMTP_PORT,
          user: parsed.data.SMTP_USER,
          pass: parsed.data.SMTP_PASS,
        },
      };
    } else {
      collectIssues(parsed.error, missing, invalid);
    }
  }

  if (!base.success || mail === undefined) {
    throw new ConfigurationError([...missing], [...invalid]);
  }

  return deepFreeze({
    upwork: {
      apiUrl: base.data.API_URL,
      token: base.data.UPWORK_TOKEN,
      tenantId: base.data.UPWORK_TENANTID,
      limit: base.data.LIMIT,
    },
    mail: { ...mail, from: base.data.SENDER_EMAIL, to: base.data.RECIPIENT_EMAIL },
    log: { path: base.data.LOG_PATH, level: base.data.LOG_LEVEL },
  });
}

function collectIssues(error: z.ZodError, missing: Set<string>, invalid: Set<string>): void {
  for (const issue of error.issues) {
    const key = String(issue.path[0]);
    if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object") {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
