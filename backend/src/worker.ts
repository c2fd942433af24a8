import { closeNotificationBackend } from "@/queue/queueManager";
import { connectDatastores, disconnectDatastores } from "@/utils/clients";
import { logger } from "@/utils/logger";
import { startWorkers, stopWorkers } from "@/workers";

async function start() {
  try {
    await connectDatastores();
    await startWorkers();

    const shutdown = async (signal?: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        await stopWorkers();
        await closeNotificationBackend();
        await disconnectDatastores();
        logger.info("Worker drained, exiting process");
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down worker", { error });
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
    logger.error("Failed to start notification worker", { error });
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
