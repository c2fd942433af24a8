import { config } from "@/config/config";
import { closeDatabasePool, getDatabasePool, initializeDatabase } from "@/database/connection";
import { initializeRedisService, shutdownRedisService } from "@/services/redis.service";
import { logger } from "@/utils/logger";

export const pgPool = getDatabasePool();

// Redis only carries the enqueue wake-up signal; without it the worker polls.
const redisRequired = config.worker.pushWakeup;

export async function connectDatastores() {
  await initializeDatabase();

  if (redisRequired) {
    await initializeRedisService();
  } else {
    logger.info("Enqueue wake-up disabled, skipping Redis connection");
  }
}

export async function disconnectDatastores() {
  await closeDatabasePool();
  await shutdownRedisService();
}
