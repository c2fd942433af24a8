import { config } from "@/config/config";
import { getNotificationBackend } from "@/queue/queueManager";
import { buildVerificationUrl } from "@/services/auth/jwtService";
import { EventReceiver, type EventOptions, type NotifyResult } from "@/services/notification/eventReceiver";
import { getPreferenceStore } from "@/services/preferences/preference.service";
import { publishEnqueueSignal } from "@/services/redis.service";
import { logger } from "@/utils/logger";

export type Notify = (recipient: string, eventType: string, context?: unknown, options?: EventOptions) => Promise<NotifyResult>;

export interface NotifierDeps {
  receiver: EventReceiver;
  /** Wakes idle workers; failures are logged and never reach the producer. */
  signal?: (jobCount: number) => Promise<void>;
}

export function createNotifier({ receiver, signal }: NotifierDeps): Notify {
  return async (recipient, eventType, context = {}, options) => {
    const result = await receiver.onEvent(recipient, eventType, context, options);

    // Jobs are durable at this point; the wake-up is best effort and never holds the producer.
    if (signal && result.jobIds.length > 0) {
      void signal(result.jobIds.length).catch((error: unknown) => {
        logger.warn("Failed to publish enqueue signal", { recipient, eventType, error });
      });
    }

    return result;
  };
}

let defaultNotifier: Notify | null = null;

function getDefaultNotifier(): Notify {
  if (!defaultNotifier) {
    defaultNotifier = createNotifier({
      receiver: new EventReceiver({
        backend: getNotificationBackend(),
        preferences: getPreferenceStore(),
        helpers: { verificationUrl: buildVerificationUrl },
      }),
      signal: config.worker.pushWakeup ? publishEnqueueSignal : undefined,
    });
  }

  return defaultNotifier;
}

/**
 * Producer entry point: enqueue the notifications for one domain event and
 * return. Enqueue failures reject.
 */
export const notify: Notify = (recipient, eventType, context, options) =>
  getDefaultNotifier()(recipient, eventType, context, options);
