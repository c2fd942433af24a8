import nodemailer from "nodemailer";
import type Mail from "nodemailer/lib/mailer";

import type { AppConfig } from "@/config/config";
import { TransportError, errorMessage } from "@/utils/errors";

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface MailReceipt {
  messageId: string;
  accepted: string[];
  rejected: string[];
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<MailReceipt>;
  close?(): void;
}

function responseCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && "responseCode" in error && typeof error.responseCode === "number") {
    return error.responseCode;
  }

  return undefined;
}

function toAddress(entry: string | Mail.Address): string {
  return typeof entry === "string" ? entry : entry.address;
}

export function createMailTransport(mail: AppConfig["mail"]): MailTransport {
  const transporter = nodemailer.createTransport({
    host: mail.host,
    port: mail.port,
    secure: mail.secure,
    auth: mail.user ? { user: mail.user, pass: mail.password } : undefined,
    connectionTimeout: mail.timeoutMs,
    greetingTimeout: mail.timeoutMs,
    socketTimeout: mail.timeoutMs,
  });

  return {
    async sendMail(message) {
      const info = await transporter.sendMail(message).catch((error: unknown) => {
        throw new TransportError(`SMTP delivery failed: ${errorMessage(error)}`, {
          cause: error,
          details: { responseCode: responseCodeOf(error) },
        });
      });

      return {
        messageId: info.messageId,
        accepted: info.accepted.map(toAddress),
        rejected: info.rejected.map(toAddress),
      };
    },
    close() {
      transporter.close();
    },
  };
}
