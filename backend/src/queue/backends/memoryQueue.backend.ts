import { randomUUID } from "node:crypto";

import type {
  DeliveryOutcome,
  EnqueueInput,
  JobStatus,
  NotificationChannel,
  NotificationJob,
  RecipientJobQuery,
} from "@/jobs/notificationJob";
import { DEFAULT_EVENT_TYPE, TERMINAL_STATUSES } from "@/jobs/notificationJob";
import type { NotificationBackend } from "@/queue/backends/backend";
import { maxAttemptsFor, retryDelayFor, type RetryPolicy } from "@/queue/retryPolicy";
import { logger } from "@/utils/logger";

const DEFAULT_LIST_LIMIT = 50;

export interface InMemoryQueueOptions {
  retryPolicy: RetryPolicy;
  now?: () => Date;
}

/**
 * Process-local job store. Every method runs to completion without awaiting,
 * so a claim can never interleave with another claim.
 */
export class InMemoryQueueBackend implements NotificationBackend {
  readonly name = "memory";

  private readonly jobs = new Map<string, NotificationJob>();
  private readonly idempotencyIndex = new Map<string, string>();
  private readonly retryPolicy: RetryPolicy;
  private readonly now: () => Date;

  constructor(options: InMemoryQueueOptions) {
    this.retryPolicy = options.retryPolicy;
    this.now = options.now ?? (() => new Date());
  }

  async enqueue<C extends NotificationChannel>(input: EnqueueInput<C>): Promise<string> {
    if (input.idempotencyKey) {
      const existing = this.idempotencyIndex.get(input.idempotencyKey);
      if (existing) {
        return existing;
      }
    }

    const now = this.now();
    const job: NotificationJob = {
      id: randomUUID(),
      recipient: input.recipient,
      channel: input.channel,
      eventType: input.eventType ?? DEFAULT_EVENT_TYPE,
      payload: { ...input.payload },
      status: "pending",
      attemptCount: 0,
      maxAttempts: maxAttemptsFor(input.channel, this.retryPolicy),
      lastError: null,
      idempotencyKey: input.idempotencyKey ?? null,
      availableAt: now,
      claimedAt: null,
      sentAt: null,
      readAt: null,
      archivedAt: null,
      createdAt: now,
      updatedAt: now,
    };

    this.jobs.set(job.id, job);
    if (job.idempotencyKey) {
      this.idempotencyIndex.set(job.idempotencyKey, job.id);
    }

    return job.id;
  }

  async fetchBatch(maxJobs: number): Promise<NotificationJob[]> {
    if (maxJobs <= 0) {
      return [];
    }

    const now = this.now();
    const due = [...this.jobs.values()]
      .filter((job) => job.status === "pending" && job.availableAt.getTime() <= now.getTime())
      .sort((a, b) => a.availableAt.getTime() - b.availableAt.getTime() || a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, maxJobs);

    for (const job of due) {
      job.status = "in_progress";
      job.claimedAt = now;
      job.updatedAt = now;
    }

    return due.map(cloneJob);
  }

  async markResult(jobId: string, outcome: DeliveryOutcome): Promise<JobStatus | null> {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== "in_progress") {
      return null;
    }

    const now = this.now();
    job.attemptCount += 1;
    job.claimedAt = null;
    job.updatedAt = now;

    if (outcome.status === "sent") {
      job.status = "sent";
      job.sentAt = now;
      return job.status;
    }

    job.lastError = outcome.reason;
    if (outcome.retryable && job.attemptCount < job.maxAttempts) {
      job.status = "pending";
      job.availableAt = new Date(now.getTime() + retryDelayFor(job.attemptCount, this.retryPolicy));
    } else {
      job.status = "failed";
    }

    return job.status;
  }

  async recoverStaleClaims(staleAfterMs: number): Promise<string[]> {
    const now = this.now();
    const cutoff = now.getTime() - staleAfterMs;
    const recovered: string[] = [];

    for (const job of this.jobs.values()) {
      if (job.status === "in_progress" && job.claimedAt && job.claimedAt.getTime() < cutoff) {
        job.status = "pending";
        job.claimedAt = null;
        job.updatedAt = now;
        recovered.push(job.id);
      }
    }

    if (recovered.length > 0) {
      logger.debug("In-memory stale claims reset", { count: recovered.length });
    }

    return recovered;
  }

  async getJob(jobId: string): Promise<NotificationJob | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async listForRecipient(recipient: string, query: RecipientJobQuery = {}): Promise<NotificationJob[]> {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;

    // Newest first; reversing insertion order first breaks same-millisecond ties the same way.
    return [...this.jobs.values()]
      .reverse()
      .filter((job) => job.recipient === recipient)
      .filter((job) => !query.channel || job.channel === query.channel)
      .filter((job) => !query.status || job.status === query.status)
      .filter((job) => !query.unreadOnly || job.readAt === null)
      .filter((job) => job.archivedAt === null)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(cloneJob);
  }

  async markRead(jobId: string, recipient: string): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job || job.recipient !== recipient || job.channel !== "in_app") {
      return false;
    }

    if (job.readAt === null) {
      job.readAt = this.now();
    }

    return true;
  }

  async archiveTerminal(olderThan: Date): Promise<number> {
    const now = this.now();
    let archived = 0;

    for (const job of this.jobs.values()) {
      if (TERMINAL_STATUSES.has(job.status) && job.archivedAt === null && job.updatedAt.getTime() < olderThan.getTime()) {
        job.archivedAt = now;
        archived += 1;
      }
    }

    return archived;
  }

  /** Number of stored jobs, archived ones included. */
  size(): number {
    return this.jobs.size;
  }
}

function cloneJob(job: NotificationJob): NotificationJob {
  return { ...job, payload: { ...job.payload } };
}
