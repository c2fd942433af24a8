import type { NotificationBackend } from "@/queue/backends/backend";
import { logger } from "@/utils/logger";

export async function runStaleClaimSweep(backend: NotificationBackend, staleAfterMs: number): Promise<string[]> {
  logger.debug("Starting stale claim sweep", { staleAfterMs });

  try {
    const recovered = await backend.recoverStaleClaims(staleAfterMs);

    if (recovered.length > 0) {
      logger.warn("Stale claims returned to the queue", { count: recovered.length, jobIds: recovered });
    }

    return recovered;
  } catch (error) {
    logger.error("Stale claim sweep failed", { error });
    throw error;
  }
}
