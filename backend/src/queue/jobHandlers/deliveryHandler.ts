import type { DeliveryResult, NotificationChannel, NotificationJob } from "@/jobs/notificationJob";
import { logger } from "@/utils/logger";

/**
 * Delivers one claimed job over the channel(s) it serves. Implementations
 * report failures through the result rather than throwing; the worker still
 * treats a thrown error as a retryable failure.
 */
export interface DeliveryHandler {
  readonly name: string;
  readonly channels: readonly NotificationChannel[];
  deliver(job: NotificationJob): Promise<DeliveryResult>;
}

export class DeliveryHandlerRegistry {
  private readonly handlers = new Map<NotificationChannel, DeliveryHandler>();

  constructor(handlers: DeliveryHandler[] = []) {
    handlers.forEach((handler) => this.register(handler));
  }

  register(handler: DeliveryHandler) {
    for (const channel of handler.channels) {
      const existing = this.handlers.get(channel);
      if (existing) {
        throw new Error(`Channel "${channel}" is already handled by ${existing.name}`);
      }
    }

    for (const channel of handler.channels) {
      this.handlers.set(channel, handler);
    }

    logger.debug("Delivery handler registered", { handler: handler.name, channels: handler.channels });
  }

  resolve(channel: NotificationChannel): DeliveryHandler | undefined {
    return this.handlers.get(channel);
  }

  channels(): NotificationChannel[] {
    return [...this.handlers.keys()];
  }
}
