import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { NOTIFICATION_CHANNELS } from "@/jobs/notificationJob";
import { parseRequest } from "@/middleware/validateRequest";
import { verifyJWT } from "@/middleware/verifyJWT";
import type { PreferenceStore } from "@/services/preferences/preference.service";

export interface PreferenceRouteOptions {
  preferences: PreferenceStore;
}

const channelParamsSchema = z.object({
  channel: z.enum(NOTIFICATION_CHANNELS),
});

const updatePreferenceSchema = z.object({
  enabled: z.boolean(),
});

export async function registerPreferenceRoutes(app: FastifyInstance, { preferences }: PreferenceRouteOptions) {
  app.get("/", { preHandler: [verifyJWT] }, async (request) => {
    const data = await preferences.getPreferences(request.user.id);
    return { data };
  });

  app.put("/:channel", { preHandler: [verifyJWT] }, async (request) => {
    const { channel } = parseRequest(channelParamsSchema, request.params, "params");
    const { enabled } = parseRequest(updatePreferenceSchema, request.body, "body");

    return preferences.setPreference(request.user.id, channel, enabled);
  });
}
