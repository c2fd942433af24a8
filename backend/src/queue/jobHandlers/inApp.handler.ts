import type { DeliveryResult, NotificationChannel, NotificationJob } from "@/jobs/notificationJob";
import type { NotificationBackend } from "@/queue/backends/backend";
import type { DeliveryHandler } from "@/queue/jobHandlers/deliveryHandler";
import { NOTIFICATION_EVENT, type ConnectionRegistry, type RealtimeMessage } from "@/realtime/connectionRegistry";
import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";

export const OFFLINE = "offline";
export const PUSH_FAILED = "push_failed";

export function toRealtimeMessage(job: NotificationJob): RealtimeMessage {
  return {
    type: NOTIFICATION_EVENT,
    data: {
      ...job.payload,
      jobId: job.id,
      eventType: job.eventType,
      createdAt: job.createdAt.toISOString(),
    },
  };
}

export class InAppDeliveryHandler implements DeliveryHandler {
  readonly name = "in_app";
  readonly channels: readonly NotificationChannel[] = ["in_app"];

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly backend: Pick<NotificationBackend, "markRead">,
  ) {}

  async deliver(job: NotificationJob): Promise<DeliveryResult> {
    if (this.registry.countFor(job.recipient) === 0) {
      logger.debug("Recipient has no live connection", { jobId: job.id, recipient: job.recipient });
      return { ok: false, reason: OFFLINE, retryable: true };
    }

    const delivered = await this.registry.push(job.recipient, toRealtimeMessage(job));
    if (delivered === 0) {
      // Every handle was dead or refused; pruning may have left the user offline.
      const reason = this.registry.countFor(job.recipient) === 0 ? OFFLINE : PUSH_FAILED;
      return { ok: false, reason, retryable: true };
    }

    logger.info("In-app notification pushed", { jobId: job.id, recipient: job.recipient, delivered });

    // A live push counts as seen, so reconnects do not replay it.
    try {
      await this.backend.markRead(job.id, job.recipient);
    } catch (error) {
      logger.warn("Failed to mark pushed notification read", { jobId: job.id, error: errorMessage(error) });
    }

    return { ok: true };
  }
}
