import type { DeliveryResult, NotificationChannel, NotificationJob } from "@/jobs/notificationJob";
import type { DeliveryHandler } from "@/queue/jobHandlers/deliveryHandler";
import type { MailMessage, MailTransport } from "@/services/mail/mailTransport";
import type { UserDirectory } from "@/services/user/userService";
import { TransportError, errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";

export const DEFAULT_SUBJECT = "No Subject";
export const DEFAULT_BODY_TEXT = "No text content.";
export const RECIPIENT_NOT_FOUND = "recipient_not_found";

export interface EmailHandlerDeps {
  transport: MailTransport;
  users: UserDirectory;
  from: string;
}

function readString(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function renderEmail(job: NotificationJob, to: string, from: string): MailMessage {
  const html = readString(job.payload, "bodyHtml");

  return {
    from,
    to,
    subject: readString(job.payload, "subject") ?? DEFAULT_SUBJECT,
    text: readString(job.payload, "bodyText") ?? DEFAULT_BODY_TEXT,
    ...(html ? { html } : {}),
  };
}

export class EmailDeliveryHandler implements DeliveryHandler {
  readonly name = "email";
  readonly channels: readonly NotificationChannel[] = ["email"];

  constructor(private readonly deps: EmailHandlerDeps) {}

  async deliver(job: NotificationJob): Promise<DeliveryResult> {
    const contact = await this.deps.users.getUserContact(job.recipient);
    if (!contact?.email) {
      logger.warn("Email recipient could not be resolved", { jobId: job.id, recipient: job.recipient });
      return { ok: false, reason: RECIPIENT_NOT_FOUND, retryable: false };
    }

    const message = renderEmail(job, contact.email, this.deps.from);

    try {
      const receipt = await this.deps.transport.sendMail(message);

      if (receipt.rejected.length > 0 || receipt.accepted.length === 0) {
        logger.warn("SMTP server rejected recipient", { jobId: job.id, rejected: receipt.rejected });
        return { ok: false, reason: `recipient rejected: ${receipt.rejected.join(", ") || contact.email}`, retryable: true };
      }

      logger.info("Email delivered", { jobId: job.id, recipient: job.recipient, messageId: receipt.messageId });
      return { ok: true };
    } catch (error) {
      logger.error("Email transport failed", { jobId: job.id, recipient: job.recipient, error });
      const retryable = error instanceof TransportError ? error.retryable : true;
      return { ok: false, reason: errorMessage(error), retryable };
    }
  }
}
