import cron, { type ScheduledTask } from "node-cron";

import type { NotificationBackend } from "@/queue/backends/backend";
import { logger } from "@/utils/logger";

import { runJobArchive } from "./jobs/jobArchive";
import { runStaleClaimSweep } from "./jobs/staleClaimSweep";

type CronTask = ScheduledTask;

export interface MaintenanceContext {
  backend: NotificationBackend;
  staleAfterMs: number;
  archiveAfterDays: number;
}

export const STALE_SWEEP_SCHEDULE = "* * * * *";
export const ARCHIVE_SCHEDULE = "0 3 * * *";

const scheduledTasks: CronTask[] = [];
let isSchedulerRunning = false;

function schedule(name: string, expression: string, task: () => Promise<unknown>) {
  return cron.schedule(
    expression,
    async () => {
      logger.debug("Cron job triggered", { job: name });
      try {
        await task();
      } catch (error) {
        logger.error("Cron job failed with unhandled error", { job: name, error });
      }
    },
    {
      scheduled: true,
      timezone: "UTC",
    },
  );
}

export function startCronJobs(context: MaintenanceContext) {
  if (isSchedulerRunning) {
    logger.warn("Cron scheduler is already running");
    return;
  }

  scheduledTasks.push(
    schedule("stale_claim_sweep", STALE_SWEEP_SCHEDULE, () =>
      runStaleClaimSweep(context.backend, context.staleAfterMs),
    ),
    schedule("job_archive", ARCHIVE_SCHEDULE, () => runJobArchive(context.backend, context.archiveAfterDays)),
  );

  isSchedulerRunning = true;
  logger.info("Cron scheduler started", {
    jobs: [
      { name: "stale_claim_sweep", schedule: STALE_SWEEP_SCHEDULE, timezone: "UTC" },
      { name: "job_archive", schedule: ARCHIVE_SCHEDULE, timezone: "UTC" },
    ],
  });
}

export function stopCronJobs() {
  if (!isSchedulerRunning) {
    return;
  }

  for (const task of scheduledTasks) {
    task.stop();
  }

  scheduledTasks.length = 0;
  isSchedulerRunning = false;

  logger.info("Cron scheduler stopped");
}

export function isRunning(): boolean {
  return isSchedulerRunning;
}
