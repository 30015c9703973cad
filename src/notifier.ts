import { NotificationSendError } from "./errors.js";
import type { AppLogger } from "./logger.js";
import type { Mailer } from "./mailer.js";
import type { EmailJob, ExitCode, Notification } from "./types.js";

/**
 * Sends one email. A delivery failure is logged and reported through the
 * return value; it never throws and never retries.
 */
export async function sendNotification(
  email: EmailJob,
  mailer: Mailer,
  logger: AppLogger,
): Promise<boolean> {
  logger.info(`Sending "${email.subject}" to ${email.to} via ${mailer.id}...`);

  try {
    await mailer.send(email);
  } catch (error) {
    logger.error(new NotificationSendError(email.to, error));
    return false;
  }

  logger.info(`Email sent to ${email.to}`);
  return true;
}

export async function deliverNotification(
  notification: Notification,
  mailer: Mailer,
  logger: AppLogger,
): Promise<ExitCode> {
  const sent = await sendNotification(notification.email, mailer, logger);
  return sent ? notification.exitCode : notification.exitCodeOnSendFailure;
}
