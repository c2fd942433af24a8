import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { requireRole } from "@/middleware/requireRole";
import { parseRequest } from "@/middleware/validateRequest";
import { verifyJWT } from "@/middleware/verifyJWT";
import type { Notify } from "@/services/notification/notification.service";
import { EVENT_TYPES } from "@/services/notification/templates";

export interface EventRouteOptions {
  notify: Notify;
}

const eventBodySchema = z.object({
  recipient: z.string().trim().min(1),
  eventType: z.enum(EVENT_TYPES),
  context: z.record(z.unknown()).default({}),
  idempotencyKey: z.string().trim().min(1).max(200).optional(),
});

export async function registerEventRoutes(app: FastifyInstance, { notify }: EventRouteOptions) {
  app.post("/", { preHandler: [verifyJWT, requireRole("service", "admin")] }, async (request, reply) => {
    const body = parseRequest(eventBodySchema, request.body, "body");
    const result = await notify(body.recipient, body.eventType, body.context, {
      idempotencyKey: body.idempotencyKey,
    });

    return reply.status(202).send(result);
  });
}
