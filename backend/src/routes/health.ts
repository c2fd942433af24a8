import type { FastifyInstance } from "fastify";

import { checkRedisHealth } from "@/services/redis.service";
import type { HealthStatus } from "@/types/common";
import { pgPool } from "@/utils/clients";
import { ServiceUnavailableError, errorMessage } from "@/utils/errors";

export interface HealthRouteOptions {
  /** Extra liveness details, e.g. the worker loop state. */
  details?: () => Record<string, unknown>;
}

const now = () => new Date().toISOString();

async function ensureDatabaseHealthy() {
  try {
    await pgPool.query("SELECT 1");
  } catch (error) {
    throw new ServiceUnavailableError("PostgreSQL is unavailable", { cause: errorMessage(error) });
  }
}

async function ensureRedisHealthy() {
  const healthy = await checkRedisHealth();
  if (!healthy) {
    throw new ServiceUnavailableError("Redis is unavailable");
  }
}

export async function registerHealthRoutes(app: FastifyInstance, options: HealthRouteOptions) {
  app.get("/health", async (): Promise<HealthStatus> => ({
    status: "ok",
    service: "notification-dispatch",
    timestamp: now(),
    ...(options.details ? { details: options.details() } : {}),
  }));

  app.get("/health/db", async (): Promise<HealthStatus> => {
    await ensureDatabaseHealthy();
    return {
      status: "ok",
      service: "postgres",
      timestamp: now(),
    };
  });

  app.get("/health/redis", async (): Promise<HealthStatus> => {
    await ensureRedisHealthy();
    return {
      status: "ok",
      service: "redis",
      timestamp: now(),
    };
  });
}
