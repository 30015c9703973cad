import nodemailer from "nodemailer";
import { Resend } from "resend";
import type { AppConfig, SmtpSettings } from "./config.js";
import type { EmailJob } from "./types.js";

const SMTP_TIMEOUT_MS = 30_000;
const STARTTLS_PORTS = new Set([587, 25]);
const IMPLICIT_TLS_PORT = 465;

export interface Mailer {
  readonly id: string;
  send(email: EmailJob): Promise<void>;
}

export function createSmtpMailer(settings: SmtpSettings): Mailer {
  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === IMPLICIT_TLS_PORT,
    requireTLS: STARTTLS_PORTS.has(settings.port),
    auth: {
      user: settings.user,
      pass: settings.pass,
    },
    connectionTimeout: SMTP_TIMEOUT_MS,
    greetingTimeout: SMTP_TIMEOUT_MS,
    socketTimeout: SMTP_TIMEOUT_MS,
  });

  return {
    id: "smtp",
    async send(email) {
      await transporter.sendMail({
        from: email.from,
        to: email.to,
        subject: email.subject,
        text: email.text,
        date: email.date,
        ...(email.attachment
          ? {
              attachments: [
                {
                  filename: email.attachment.filename,
                  content: email.attachment.content,
                  contentType: email.attachment.contentType,
                },
              ],
            }
          : {}),
      });
    },
  };
}

export function createResendMailer(apiKey: string): Mailer {
  const resend = new Resend(apiKey);

  return {
    id: "resend",
    async send(email) {
      const { error } = await resend.emails.send({
        from: email.from,
        to: email.to,
        subject: email.subject,
        text: email.text,
        ...(email.attachment
          ? {
              attachments: [
                {
                  filename: email.attachment.filename,
                  content: email.attachment.content,
                  contentType: email.attachment.contentType,
                },
              ],
            }
          : {}),
      });

      if (error) {
        throw new Error(`Failed to send email: ${error.message}`);
      }
    },
  };
}

export function createMailer(mail: AppConfig["mail"]): Mailer {
  return mail.transport === "resend"
    ? createResendMailer(mail.resendApiKey)
    : createSmtpMailer(mail.smtp);
}
