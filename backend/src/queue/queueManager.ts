import { config } from "@/config/config";
import type { NotificationBackend } from "@/queue/backends/backend";
import { InMemoryQueueBackend } from "@/queue/backends/memoryQueue.backend";
import { PostgresQueueBackend } from "@/queue/backends/postgresQueue.backend";
import type { RetryPolicy } from "@/queue/retryPolicy";
import { pgPool } from "@/utils/clients";
import { logger } from "@/utils/logger";

export type BackendName = typeof config.worker.backend;

let backend: NotificationBackend | null = null;

export function retryPolicyFromConfig(): RetryPolicy {
  return {
    maxAttempts: config.worker.maxAttempts,
    inAppMaxAttempts: config.worker.inAppMaxAttempts,
    retryDelayMs: config.worker.retryDelayMs,
    maxRetryDelayMs: config.worker.maxBackoffMs,
  };
}

const backendFactories: Record<BackendName, (policy: RetryPolicy) => NotificationBackend> = {
  postgres: (policy) => new PostgresQueueBackend(pgPool, policy),
  memory: (policy) => new InMemoryQueueBackend({ retryPolicy: policy }),
};

export function createBackend(name: BackendName, policy: RetryPolicy = retryPolicyFromConfig()): NotificationBackend {
  return backendFactories[name](policy);
}

/** Process-wide backend, selected by `NOTIFICATION_BACKEND`. */
export function getNotificationBackend(): NotificationBackend {
  if (!backend) {
    backend = createBackend(config.worker.backend);
    logger.info("Notification backend initialized", { backend: backend.name });
  }

  return backend;
}

export async function closeNotificationBackend() {
  if (!backend) {
    return;
  }

  try {
    await backend.close?.();
  } catch (error) {
    logger.error("Failed to close notification backend", { error });
  }

  backend = null;
}
