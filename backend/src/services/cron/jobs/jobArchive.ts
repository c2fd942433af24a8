import type { NotificationBackend } from "@/queue/backends/backend";
import { logger } from "@/utils/logger";

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runJobArchive(backend: NotificationBackend, afterDays: number, now = new Date()): Promise<number> {
  const cutoffDate = new Date(now.getTime() - afterDays * DAY_MS);
  logger.info("Starting notification archive", { cutoffDate: cutoffDate.toISOString() });

  try {
    const archivedCount = await backend.archiveTerminal(cutoffDate);
    logger.info("Notification archive completed", { archivedCount });
    return archivedCount;
  } catch (error) {
    logger.error("Notification archive failed", { error });
    throw error;
  }
}
