import { createClient } from "redis";

import { config } from "@/config/config";
import { logger } from "@/utils/logger";
import { withTimeout } from "@/utils/queueHelpers";

export const ENQUEUE_CHANNEL = "notifications:enqueued";
export const SIGNAL_TIMEOUT_MS = 1_000;

type ManagedRedisClient = ReturnType<typeof createClient>;

let commandClient: ManagedRedisClient | null = null;
let subscriberClient: ManagedRedisClient | null = null;

function createManagedClient(label: string): ManagedRedisClient {
  const client = createClient({
    url: config.redis.url,
    // Commands fail fast while reconnecting instead of queueing until Redis returns.
    disableOfflineQueue: true,
    socket: {
      reconnectStrategy: (retries) => Math.min(retries * 50, 2_000),
    },
  });

  attachListeners(client, label);
  return client;
}

function attachListeners(client: ManagedRedisClient, label: string) {
  client.on("ready", () => logger.info("Redis client ready", { label }));
  client.on("error", (error) => logger.error("Redis client error", { label, error }));
  client.on("end", () => logger.warn("Redis client disconnected", { label }));
  client.on("reconnecting", () => logger.warn("Redis client reconnecting", { label }));
}

async function ensureClientConnected(client: ManagedRedisClient) {
  if (!client.isOpen) {
    await client.connect();
  }
}

export async function initializeRedisService() {
  await getRedisClient();
}

export async function getRedisClient(): Promise<ManagedRedisClient> {
  if (!commandClient) {
    commandClient = createManagedClient("command");
  }

  await ensureClientConnected(commandClient);
  return commandClient;
}

export async function withRedisClient<T>(executor: (client: ManagedRedisClient) => Promise<T> | T) {
  const client = await getRedisClient();
  return executor(client);
}

export async function checkRedisHealth() {
  try {
    const pong = await withRedisClient((client) => client.ping());
    return pong === "PONG";
  } catch (error) {
    logger.error("Redis health check failed", { error });
    return false;
  }
}

/** Announces new jobs so idle workers poll immediately instead of waiting out their interval. */
export async function publishEnqueueSignal(jobCount: number) {
  await withTimeout(
    withRedisClient((client) => client.publish(ENQUEUE_CHANNEL, String(jobCount))),
    SIGNAL_TIMEOUT_MS,
    "Enqueue signal timed out",
  );
}

/**
 * Subscribes on a dedicated connection; a client in subscriber mode cannot
 * issue regular commands.
 */
export async function subscribeToEnqueueSignal(listener: (jobCount: number) => void) {
  if (!subscriberClient) {
    const base = await getRedisClient();
    subscriberClient = base.duplicate();
    attachListeners(subscriberClient, "subscriber");
  }

  await ensureClientConnected(subscriberClient);
  await subscriberClient.subscribe(ENQUEUE_CHANNEL, (message) => {
    const count = Number.parseInt(message, 10);
    listener(Number.isNaN(count) ? 1 : count);
  });
}

export async function shutdownRedisService() {
  const clients = [subscriberClient, commandClient].filter((client): client is ManagedRedisClient => client !== null);
  subscriberClient = null;
  commandClient = null;

  await Promise.all(
    clients.map(async (client) => {
      if (!client.isOpen) {
        return;
      }

      try {
        await client.quit();
      } catch (error) {
        logger.error("Failed to close Redis client", { error });
      }
    }),
  );

  logger.info("Redis clients shut down");
}
