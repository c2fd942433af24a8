import { ZodError } from "zod";

import type { NotificationChannel } from "@/jobs/notificationJob";
import { NOTIFICATION_CHANNELS } from "@/jobs/notificationJob";
import type { NotificationBackend } from "@/queue/backends/backend";
import type { PreferenceStore } from "@/services/preferences/preference.service";
import { isEventType, renderEvent, type ChannelMessages, type TemplateHelpers } from "@/services/notification/templates";
import { ValidationError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface EventOptions {
  /** Collapses repeated deliveries of the same event; suffixed per channel. */
  idempotencyKey?: string;
}

export interface NotifyResult {
  jobIds: string[];
  /** Channels the recipient has opted out of. */
  skipped: NotificationChannel[];
}

export interface EventReceiverDeps {
  backend: NotificationBackend;
  preferences: PreferenceStore;
  helpers: TemplateHelpers;
}

/**
 * Turns a domain event into queued jobs. Never delivers; a job is only
 * created for channels the recipient has enabled.
 */
export class EventReceiver {
  constructor(private readonly deps: EventReceiverDeps) {}

  async onEvent(recipient: string, eventType: string, context: unknown, options: EventOptions = {}): Promise<NotifyResult> {
    if (recipient.trim().length === 0) {
      throw new ValidationError("Recipient is required");
    }

    if (!isEventType(eventType)) {
      throw new ValidationError(`Unknown event type: ${eventType}`);
    }

    let messages: ChannelMessages;
    try {
      messages = renderEvent(eventType, recipient, context, this.deps.helpers);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ValidationError(`Invalid context for ${eventType}`, error.flatten());
      }

      throw error;
    }

    const result: NotifyResult = { jobIds: [], skipped: [] };

    for (const channel of NOTIFICATION_CHANNELS) {
      const payload = messages[channel];
      if (!payload) {
        continue;
      }

      const enabled = await this.deps.preferences.isEnabled(recipient, channel);
      if (!enabled) {
        logger.info("Recipient opted out of channel; skipping", { recipient, eventType, channel });
        result.skipped.push(channel);
        continue;
      }

      const jobId = await this.deps.backend.enqueue({
        recipient,
        channel,
        payload,
        eventType,
        idempotencyKey: options.idempotencyKey ? `${options.idempotencyKey}:${channel}` : undefined,
      });

      logger.info("Notification enqueued", { jobId, recipient, eventType, channel });
      result.jobIds.push(jobId);
    }

    return result;
  }
}
