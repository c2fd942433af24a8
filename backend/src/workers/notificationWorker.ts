import type { DeliveryOutcome, JobStatus, NotificationJob } from "@/jobs/notificationJob";
import type { NotificationBackend } from "@/queue/backends/backend";
import type { DeliveryHandlerRegistry } from "@/queue/jobHandlers/deliveryHandler";
import { runStaleClaimSweep } from "@/services/cron/jobs/staleClaimSweep";
import type { PreferenceStore } from "@/services/preferences/preference.service";
import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { exponentialBackoff, mapWithConcurrency } from "@/utils/queueHelpers";

export const NO_HANDLER = "no_handler";
/** The recipient disabled the channel after the job was enqueued. Terminal. */
export const SUPPRESSED = "suppressed";

export type WorkerPhase = "idle" | "fetching" | "dispatching" | "recording" | "stopped";

export interface WorkerOptions {
  batchSize: number;
  concurrency: number;
  pollIntervalMs: number;
  staleAfterMs: number;
  errorBackoffMs: number;
  maxBackoffMs: number;
}

export interface WorkerDeps {
  backend: NotificationBackend;
  handlers: DeliveryHandlerRegistry;
  preferences: PreferenceStore;
  options: WorkerOptions;
}

export interface CycleSummary {
  claimed: number;
  sent: number;
  failed: number;
  retried: number;
  suppressed: number;
}

const emptySummary = (): CycleSummary => ({ claimed: 0, sent: 0, failed: 0, retried: 0, suppressed: 0 });

/**
 * Drains the notification queue: claim a batch, dispatch each job to its
 * channel handler, record every outcome. One loop per process; parallelism
 * lives inside a cycle.
 */
export class NotificationWorker {
  private phase: WorkerPhase = "stopped";
  private stopRequested = false;
  private wakeRequested = false;
  private loopPromise: Promise<void> | null = null;
  private interruptSleep: (() => void) | null = null;
  private consecutiveErrors = 0;

  constructor(private readonly deps: WorkerDeps) {}

  getState() {
    return {
      phase: this.phase,
      running: this.loopPromise !== null,
      consecutiveErrors: this.consecutiveErrors,
    };
  }

  async start() {
    if (this.loopPromise) {
      return;
    }

    this.stopRequested = false;
    this.phase = "idle";
    await this.sweepStaleClaims();

    logger.info("Notification worker started", {
      backend: this.deps.backend.name,
      channels: this.deps.handlers.channels(),
      ...this.deps.options,
    });

    this.loopPromise = this.loop();
  }

  /** Finishes the in-flight cycle, then exits the loop. */
  async stop() {
    this.stopRequested = true;
    this.interruptSleep?.();

    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }

    this.phase = "stopped";
    logger.info("Notification worker stopped");
  }

  /** Cuts the current idle sleep short, or skips the next one. */
  wake() {
    this.wakeRequested = true;
    this.interruptSleep?.();
  }

  /** Startup crash recovery; a store outage here must not keep the loop from starting. */
  async sweepStaleClaims(): Promise<string[]> {
    try {
      return await runStaleClaimSweep(this.deps.backend, this.deps.options.staleAfterMs);
    } catch {
      return [];
    }
  }

  async runCycle(): Promise<CycleSummary> {
    const summary = emptySummary();
    const { backend, options } = this.deps;

    this.phase = "fetching";
    let jobs: NotificationJob[];
    try {
      jobs = await backend.fetchBatch(options.batchSize);
    } finally {
      this.phase = "idle";
    }

    if (jobs.length === 0) {
      return summary;
    }

    summary.claimed = jobs.length;

    this.phase = "dispatching";
    const outcomes = await mapWithConcurrency(jobs, options.concurrency, (job) => this.dispatch(job));

    this.phase = "recording";
    const recorded = await Promise.allSettled(jobs.map((job, index) => backend.markResult(job.id, outcomes[index])));

    recorded.forEach((result, index) => {
      const job = jobs[index];
      const outcome = outcomes[index];

      if (result.status === "rejected") {
        logger.error("Failed to record delivery outcome; job left for the stale sweep", {
          jobId: job.id,
          recipient: job.recipient,
          channel: job.channel,
          error: result.reason,
        });
        return;
      }

      tally(summary, result.value, outcome, job);
    });

    this.phase = "idle";
    if (summary.claimed > 0) {
      logger.info("Notification cycle complete", summary);
    }

    return summary;
  }

  private async dispatch(job: NotificationJob): Promise<DeliveryOutcome> {
    const context = { jobId: job.id, recipient: job.recipient, channel: job.channel, attempt: job.attemptCount + 1 };

    try {
      const enabled = await this.deps.preferences.isEnabled(job.recipient, job.channel);
      if (!enabled) {
        logger.info("Notification suppressed by preference", context);
        return { status: "failed", reason: SUPPRESSED, retryable: false };
      }

      const handler = this.deps.handlers.resolve(job.channel);
      if (!handler) {
        logger.error("No delivery handler registered for channel", context);
        return { status: "failed", reason: NO_HANDLER, retryable: false };
      }

      const result = await handler.deliver(job);
      if (result.ok) {
        return { status: "sent" };
      }

      logger.warn("Notification delivery failed", { ...context, reason: result.reason, retryable: result.retryable });
      return { status: "failed", reason: result.reason, retryable: result.retryable };
    } catch (error) {
      const reason = errorMessage(error);
      logger.error("Notification delivery threw", { ...context, error });
      return { status: "failed", reason, retryable: true };
    }
  }

  private async loop() {
    while (!this.stopRequested) {
      let delayMs = this.deps.options.pollIntervalMs;

      try {
        const summary = await this.runCycle();
        this.consecutiveErrors = 0;
        if (summary.claimed >= this.deps.options.batchSize) {
          delayMs = 0;
        }
      } catch (error) {
        this.consecutiveErrors += 1;
        delayMs = exponentialBackoff(this.consecutiveErrors, this.deps.options.errorBackoffMs, this.deps.options.maxBackoffMs);
        logger.error("Notification cycle failed; backing off", {
          error,
          attempt: this.consecutiveErrors,
          delayMs,
        });
      }

      if (!this.stopRequested && delayMs > 0) {
        await this.sleep(delayMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.interruptSleep = null;
        resolve();
      };

      const timer = setTimeout(finish, ms);

      this.interruptSleep = () => {
        this.wakeRequested = false;
        finish();
      };
    });
  }
}

function tally(summary: CycleSummary, status: JobStatus | null, outcome: DeliveryOutcome, job: NotificationJob) {
  if (status === null) {
    logger.debug("Outcome already recorded", { jobId: job.id });
    return;
  }

  if (status === "sent") {
    summary.sent += 1;
  } else if (status === "pending") {
    summary.retried += 1;
  } else if (outcome.status === "failed" && outcome.reason === SUPPRESSED) {
    summary.suppressed += 1;
  } else {
    summary.failed += 1;
  }
}
