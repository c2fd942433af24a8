import Fastify, { type FastifyInstance } from "fastify";

import { config } from "@/config/config";
import { errorHandler } from "@/middleware/errorHandler";
import type { NotificationBackend } from "@/queue/backends/backend";
import { DeliveryHandlerRegistry } from "@/queue/jobHandlers/deliveryHandler";
import { EmailDeliveryHandler } from "@/queue/jobHandlers/email.handler";
import { InAppDeliveryHandler } from "@/queue/jobHandlers/inApp.handler";
import { getNotificationBackend } from "@/queue/queueManager";
import { ConnectionRegistry } from "@/realtime/connectionRegistry";
import { RealtimeGateway } from "@/realtime/gateway";
import { registerHealthRoutes } from "@/routes/health";
import { startCronJobs, stopCronJobs } from "@/services/cron/cronScheduler";
import { createMailTransport, type MailTransport } from "@/services/mail/mailTransport";
import { getPreferenceStore, type PreferenceStore } from "@/services/preferences/preference.service";
import { subscribeToEnqueueSignal } from "@/services/redis.service";
import { PostgresUserDirectory, type UserDirectory } from "@/services/user/userService";
import { pgPool } from "@/utils/clients";
import { logger } from "@/utils/logger";
import { NotificationWorker } from "@/workers/notificationWorker";

export interface WorkerRuntimeDeps {
  backend: NotificationBackend;
  preferences: PreferenceStore;
  users: UserDirectory;
  transport: MailTransport;
}

export interface WorkerRuntime {
  worker: NotificationWorker;
  registry: ConnectionRegistry;
  gateway: RealtimeGateway;
  server: FastifyInstance;
  transport: MailTransport;
}

let runtime: WorkerRuntime | null = null;

export function buildWorker(deps: WorkerRuntimeDeps, registry: ConnectionRegistry) {
  const handlers = new DeliveryHandlerRegistry([
    new EmailDeliveryHandler({ transport: deps.transport, users: deps.users, from: config.mail.from }),
    new InAppDeliveryHandler(registry, deps.backend),
  ]);

  return new NotificationWorker({
    backend: deps.backend,
    handlers,
    preferences: deps.preferences,
    options: {
      batchSize: config.worker.batchSize,
      concurrency: config.worker.concurrency,
      pollIntervalMs: config.worker.pollIntervalMs,
      staleAfterMs: config.worker.staleAfterMs,
      errorBackoffMs: config.worker.errorBackoffMs,
      maxBackoffMs: config.worker.maxBackoffMs,
    },
  });
}

/**
 * Starts everything the worker process owns: the connection registry and its
 * socket.io gateway, the dispatch loop, maintenance cron jobs and the Redis
 * wake-up subscription.
 */
export async function startWorkers(overrides: Partial<WorkerRuntimeDeps> = {}): Promise<WorkerRuntime> {
  if (runtime) {
    return runtime;
  }

  const deps: WorkerRuntimeDeps = {
    backend: overrides.backend ?? getNotificationBackend(),
    preferences: overrides.preferences ?? getPreferenceStore(),
    users: overrides.users ?? new PostgresUserDirectory(pgPool),
    transport: overrides.transport ?? createMailTransport(config.mail),
  };

  const registry = new ConnectionRegistry();
  const worker = buildWorker(deps, registry);

  const server = Fastify({ logger: false });
  server.setErrorHandler(errorHandler);
  await server.register(registerHealthRoutes, {
    prefix: "/api",
    details: () => ({ worker: worker.getState(), connections: registry.size() }),
  });

  const gateway = new RealtimeGateway({
    registry,
    backend: deps.backend,
    jwtSecret: config.security.jwtSecret,
    path: config.gateway.path,
    replayLimit: config.gateway.replayLimit,
    corsOrigins: config.server.corsOrigins,
  });

  // Registered before anything starts so a failed start can be torn down.
  const started: WorkerRuntime = { worker, registry, gateway, server, transport: deps.transport };
  runtime = started;

  try {
    gateway.attach(server.server);
    await server.listen({ port: config.gateway.port, host: config.gateway.host });
    logger.info(`Realtime gateway listening on http://${config.gateway.host}:${config.gateway.port}${config.gateway.path}`);

    startCronJobs({
      backend: deps.backend,
      staleAfterMs: config.worker.staleAfterMs,
      archiveAfterDays: config.archive.afterDays,
    });

    if (config.worker.pushWakeup) {
      try {
        await subscribeToEnqueueSignal(() => worker.wake());
      } catch (error) {
        logger.warn("Enqueue signal unavailable; relying on polling", { error });
      }
    }

    await worker.start();
  } catch (error) {
    logger.error("Worker runtime failed to start", { error });
    await stopWorkers();
    throw error;
  }

  return started;
}

export async function stopWorkers() {
  if (!runtime) {
    return;
  }

  const { worker, gateway, server, transport } = runtime;
  runtime = null;

  await worker.stop();
  stopCronJobs();
  await gateway.close();
  await server.close();
  transport.close?.();
  logger.info("Worker runtime stopped");
}
