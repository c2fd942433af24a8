import jwt from "jsonwebtoken";
import { vi } from "vitest";
import type { FastifyInstance } from "fastify";

import { config } from "@/config/config";
import { InMemoryQueueBackend } from "@/queue/backends/memoryQueue.backend";
import { createServer, type ApiDependencies } from "@/server";
import type { Notify } from "@/services/notification/notification.service";
import { InMemoryPreferenceStore } from "@/services/preferences/preference.service";
import type { UserDirectory } from "@/services/user/userService";
import type { UserRole } from "@/types/user";

export function createTestDependencies() {
  return {
    backend: new InMemoryQueueBackend({
      retryPolicy: { maxAttempts: 3, inAppMaxAttempts: 2, retryDelayMs: 0, maxRetryDelayMs: 0 },
    }),
    preferences: new InMemoryPreferenceStore(),
    users: {
      getUserContact: vi.fn<UserDirectory["getUserContact"]>(),
      markEmailVerified: vi.fn<UserDirectory["markEmailVerified"]>(),
    },
    notify: vi.fn<Notify>(),
  };
}

export type TestDependencies = ReturnType<typeof createTestDependencies>;

export async function buildServer(deps: Partial<ApiDependencies>): Promise<FastifyInstance> {
  const app = await createServer(deps);
  await app.ready();
  return app;
}

export function buildAuthHeader(userId: string, role?: UserRole) {
  const token = jwt.sign(role ? { sub: userId, role } : { sub: userId }, config.security.jwtSecret, {
    expiresIn: "1h",
  });
  return `Bearer ${token}`;
}
