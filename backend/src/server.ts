import { randomUUID } from "node:crypto";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import fastifyJwt from "@fastify/jwt";
import helmet from "@fastify/helmet";

import { config } from "@/config/config";
import { errorHandler } from "@/middleware/errorHandler";
import { registerRequestLogger } from "@/middleware/requestLogger";
import type { NotificationBackend } from "@/queue/backends/backend";
import { getNotificationBackend } from "@/queue/queueManager";
import { registerAuthRoutes } from "@/routes/auth";
import { registerEventRoutes } from "@/routes/events";
import { registerHealthRoutes } from "@/routes/health";
import { registerNotificationRoutes } from "@/routes/notifications";
import { registerPreferenceRoutes } from "@/routes/preferences";
import { notify, type Notify } from "@/services/notification/notification.service";
import { getPreferenceStore, type PreferenceStore } from "@/services/preferences/preference.service";
import { PostgresUserDirectory, type UserDirectory } from "@/services/user/userService";
import { pgPool } from "@/utils/clients";

export interface ApiDependencies {
  backend: NotificationBackend;
  preferences: PreferenceStore;
  users: UserDirectory;
  notify: Notify;
}

function getRequestId(headers: Record<string, string | string[] | undefined>) {
  const headerValue = headers[config.server.requestIdHeader];
  if (typeof headerValue === "string" && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return randomUUID();
}

export async function createServer(overrides: Partial<ApiDependencies> = {}): Promise<FastifyInstance> {
  const deps: ApiDependencies = {
    backend: overrides.backend ?? getNotificationBackend(),
    preferences: overrides.preferences ?? getPreferenceStore(),
    users: overrides.users ?? new PostgresUserDirectory(pgPool),
    notify: overrides.notify ?? notify,
  };

  const app = Fastify({
    logger: false,
    bodyLimit: config.server.bodyLimit,
    requestIdHeader: config.server.requestIdHeader,
    genReqId: (request) => getRequestId(request.headers),
  });

  await app.register(cors, {
    origin: config.server.corsOrigins,
    credentials: true,
  });

  await app.register(helmet);
  await app.register(fastifyJwt, { secret: config.security.jwtSecret });

  registerRequestLogger(app);
  app.setErrorHandler(errorHandler);

  await app.register(registerHealthRoutes, { prefix: "/api" });
  await app.register(registerAuthRoutes, { prefix: "/api/v1/auth", users: deps.users, notify: deps.notify });
  await app.register(registerPreferenceRoutes, { prefix: "/api/v1/preferences", preferences: deps.preferences });
  await app.register(registerNotificationRoutes, { prefix: "/api/v1/notifications", backend: deps.backend });
  await app.register(registerEventRoutes, { prefix: "/api/v1/events", notify: deps.notify });

  return app;
}
