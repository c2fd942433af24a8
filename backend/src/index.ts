import { createServer } from "./server";

import { config } from "@/config/config";
import { closeNotificationBackend } from "@/queue/queueManager";
import { connectDatastores, disconnectDatastores } from "@/utils/clients";
import { logger } from "@/utils/logger";
import { startWorkers, stopWorkers } from "@/workers";

// The in-memory queue is process-local, so the worker has to share this process.
const embeddedWorker = config.worker.backend === "memory";

async function start() {
  try {
    await connectDatastores();

    if (embeddedWorker) {
      await startWorkers();
      logger.warn("Running the notification worker inside the API process (memory backend)");
    }

    const server = await createServer();
    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`API listening on http://${config.server.host}:${config.server.port}`);

    const shutdown = async (signal?: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        await server.close();
        await stopWorkers();
        await closeNotificationBackend();
        await disconnectDatastores();
        logger.info("Cleanup complete, exiting process");
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down", { error });
        process.exit(1);
      }
    };

    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
  } catch (error) {
    logger.error("Failed to start API", { error });
    await stopWorkers().catch((stopError) => {
      logger.error("Failed to stop worker after startup failure", { stopError });
    });
    await disconnectDatastores().catch((disconnectError) => {
      logger.error("Failed to clean up resources after startup failure", { disconnectError });
    });
    process.exit(1);
  }
}

void start();
