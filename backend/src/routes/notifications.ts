import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { JOB_STATUSES, NOTIFICATION_CHANNELS, type NotificationJob } from "@/jobs/notificationJob";
import { parseRequest } from "@/middleware/validateRequest";
import { verifyJWT } from "@/middleware/verifyJWT";
import type { NotificationBackend } from "@/queue/backends/backend";
import type { ApiListResponse } from "@/types/common";
import { NotFoundError } from "@/utils/errors";

export interface NotificationRouteOptions {
  backend: NotificationBackend;
}

const listQuerySchema = z.object({
  channel: z.enum(NOTIFICATION_CHANNELS).optional(),
  status: z.enum(JOB_STATUSES).optional(),
  unread: z.enum(["true", "false"]).transform((value) => value === "true").optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

const jobParamsSchema = z.object({
  id: z.string().uuid(),
});

export function serializeJob(job: NotificationJob) {
  return {
    id: job.id,
    channel: job.channel,
    eventType: job.eventType,
    status: job.status,
    payload: job.payload,
    attemptCount: job.attemptCount,
    lastError: job.lastError,
    createdAt: job.createdAt.toISOString(),
    sentAt: job.sentAt?.toISOString() ?? null,
    readAt: job.readAt?.toISOString() ?? null,
  };
}

export type SerializedJob = ReturnType<typeof serializeJob>;

export async function registerNotificationRoutes(app: FastifyInstance, { backend }: NotificationRouteOptions) {
  app.get("/", { preHandler: [verifyJWT] }, async (request): Promise<ApiListResponse<SerializedJob>> => {
    const query = parseRequest(listQuerySchema, request.query, "query");
    const jobs = await backend.listForRecipient(request.user.id, {
      channel: query.channel,
      status: query.status,
      unreadOnly: query.unread,
      limit: query.limit,
    });

    return { data: jobs.map(serializeJob), requestId: request.id };
  });

  app.post("/:id/read", { preHandler: [verifyJWT] }, async (request) => {
    const { id } = parseRequest(jobParamsSchema, request.params, "params");
    const marked = await backend.markRead(id, request.user.id);

    if (!marked) {
      throw new NotFoundError("Notification not found", { id });
    }

    return { success: true };
  });
}
