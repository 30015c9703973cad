export interface FeedJob {
  id: string;
  title: string;
  ciphertext?: string;
}

export type FetchOutcome =
  | { readonly kind: "success"; readonly status: 200; readonly body: string }
  | { readonly kind: "auth-error"; readonly status: 401 | 403; readonly body: string }
  | { readonly kind: "http-error"; readonly status: number; readonly body: string }
  | { readonly kind: "transport-failure"; readonly error: Error };

export type OutcomeKind = FetchOutcome["kind"];

export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface EmailJob {
  from: string;
  to: string;
  subject: string;
  text: string;
  date: Date;
  attachment?: EmailAttachment;
}

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  configurationMissing: 2,
  authError: 3,
  httpError: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface Notification {
  branch: OutcomeKind;
  email: EmailJob;
  exitCode: ExitCode;
  exitCodeOnSendFailure: ExitCode;
}
