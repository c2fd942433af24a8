import type {
  DeliveryOutcome,
  EnqueueInput,
  JobStatus,
  NotificationChannel,
  NotificationJob,
  RecipientJobQuery,
} from "@/jobs/notificationJob";

/**
 * Storage and claim semantics for notification jobs. The worker depends only
 * on this contract, never on the storage technology behind it.
 *
 * Every method surfaces store failures as `TransientStoreError`.
 */
export interface NotificationBackend {
  readonly name: string;

  /** Persists a new `pending` job and returns its id. */
  enqueue<C extends NotificationChannel>(input: EnqueueInput<C>): Promise<string>;

  /**
   * Claims up to `maxJobs` due pending jobs, moving them to `in_progress`.
   * A job is handed to at most one caller. Resolves to `[]` when none are due.
   */
  fetchBatch(maxJobs: number): Promise<NotificationJob[]>;

  /**
   * Records the outcome of a claimed job. Resolves to the job's new status, or
   * `null` when the job was not `in_progress` (already recorded or unknown).
   */
  markResult(jobId: string, outcome: DeliveryOutcome): Promise<JobStatus | null>;

  /** Returns claims older than the staleness window to `pending`; resolves to their ids. */
  recoverStaleClaims(staleAfterMs: number): Promise<string[]>;

  getJob(jobId: string): Promise<NotificationJob | null>;

  /** Unarchived jobs of one recipient, newest first, at most `query.limit`. */
  listForRecipient(recipient: string, query?: RecipientJobQuery): Promise<NotificationJob[]>;

  /**
   * Stamps an in-app job as read by its recipient. Leaves `updatedAt` alone, so
   * reading never delays archival. Resolves to false when nothing matched.
   */
  markRead(jobId: string, recipient: string): Promise<boolean>;

  /** Stamps terminal jobs last updated before `olderThan` as archived; resolves to the count. */
  archiveTerminal(olderThan: Date): Promise<number>;

  close?(): Promise<void>;
}
