import type { SqlExecutor } from "@/database/connection";
import type {
  DeliveryOutcome,
  EnqueueInput,
  JobStatus,
  NotificationChannel,
  NotificationJob,
  RecipientJobQuery,
} from "@/jobs/notificationJob";
import { DEFAULT_EVENT_TYPE, JOB_STATUSES, isNotificationChannel } from "@/jobs/notificationJob";
import type { NotificationBackend } from "@/queue/backends/backend";
import { maxAttemptsFor, type RetryPolicy } from "@/queue/retryPolicy";
import { TransientStoreError } from "@/utils/errors";
import { logger } from "@/utils/logger";

const DEFAULT_LIST_LIMIT = 50;

const JOB_COLUMNS = `id, recipient, channel, event_type, payload, status, attempt_count, max_attempts, last_error,
  idempotency_key, available_at, claimed_at, sent_at, read_at, archived_at, created_at, updated_at`;

export interface NotificationJobRow {
  id: string;
  recipient: string;
  channel: string;
  event_type: string;
  payload: unknown;
  status: string;
  attempt_count: number;
  max_attempts: number;
  last_error: string | null;
  idempotency_key: string | null;
  available_at: Date;
  claimed_at: Date | null;
  sent_at: Date | null;
  read_at: Date | null;
  archived_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

function parsePayload(value: unknown): Record<string, unknown> {
  const parsed: unknown = typeof value === "string" ? JSON.parse(value) : value;
  if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
    return { ...parsed };
  }

  return {};
}

function parseStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown notification job status: ${value}`);
  }

  return status;
}

export function mapRowToJob(row: NotificationJobRow): NotificationJob {
  if (!isNotificationChannel(row.channel)) {
    throw new Error(`Unknown notification channel: ${row.channel}`);
  }

  return {
    id: row.id,
    recipient: row.recipient,
    channel: row.channel,
    eventType: row.event_type,
    payload: parsePayload(row.payload),
    status: parseStatus(row.status),
    attemptCount: row.attempt_count,
    maxAttempts: row.max_attempts,
    lastError: row.last_error,
    idempotencyKey: row.idempotency_key,
    availableAt: row.available_at,
    claimedAt: row.claimed_at,
    sentAt: row.sent_at,
    readAt: row.read_at,
    archivedAt: row.archived_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Job store backed by the `notification_jobs` table. Claims rely on
 * `FOR UPDATE SKIP LOCKED` inside a single UPDATE, so concurrent workers never
 * receive the same row.
 */
export class PostgresQueueBackend implements NotificationBackend {
  readonly name = "postgres";

  constructor(
    private readonly pool: SqlExecutor,
    private readonly retryPolicy: RetryPolicy,
  ) {}

  async enqueue<C extends NotificationChannel>(input: EnqueueInput<C>): Promise<string> {
    const idempotencyKey = input.idempotencyKey ?? null;

    return this.run("enqueue notification job", async () => {
      const inserted = await this.pool.query<{ id: string }>(
        `INSERT INTO notification_jobs (recipient, channel, event_type, payload, status, max_attempts, idempotency_key)
         VALUES ($1, $2, $3, $4, 'pending', $5, $6)
         ON CONFLICT (idempotency_key) DO NOTHING
         RETURNING id`,
        [
          input.recipient,
          input.channel,
          input.eventType ?? DEFAULT_EVENT_TYPE,
          JSON.stringify(input.payload),
          maxAttemptsFor(input.channel, this.retryPolicy),
          idempotencyKey,
        ],
      );

      const created = inserted.rows[0];
      if (created) {
        return created.id;
      }

      const existing = await this.pool.query<{ id: string }>(
        "SELECT id FROM notification_jobs WHERE idempotency_key = $1 LIMIT 1",
        [idempotencyKey],
      );

      const duplicate = existing.rows[0];
      if (!duplicate) {
        throw new Error("Notification job insert returned no row");
      }

      logger.debug("Duplicate enqueue collapsed by idempotency key", { idempotencyKey, jobId: duplicate.id });
      return duplicate.id;
    });
  }

  async fetchBatch(maxJobs: number): Promise<NotificationJob[]> {
    if (maxJobs <= 0) {
      return [];
    }

    const result = await this.run("claim notification jobs", () =>
      this.pool.query<NotificationJobRow>(
        `UPDATE notification_jobs
         SET status = 'in_progress', claimed_at = NOW(), updated_at = NOW()
         WHERE id IN (
           SELECT id FROM notification_jobs
           WHERE status = 'pending' AND available_at <= NOW()
           ORDER BY available_at ASC, created_at ASC
           LIMIT $1
           FOR UPDATE SKIP LOCKED
         )
         RETURNING ${JOB_COLUMNS}`,
        [maxJobs],
      ),
    );

    return result.rows
      .map(mapRowToJob)
      .sort((a, b) => a.availableAt.getTime() - b.availableAt.getTime() || a.createdAt.getTime() - b.createdAt.getTime());
  }

  async markResult(jobId: string, outcome: DeliveryOutcome): Promise<JobStatus | null> {
    const sent = outcome.status === "sent";
    const reason = outcome.status === "failed" ? outcome.reason : null;
    const retryable = outcome.status === "failed" && outcome.retryable;

    // Column references on the right-hand side read the pre-update row.
    const result = await this.run("record notification result", () =>
      this.pool.query<{ status: string }>(
        `UPDATE notification_jobs
         SET attempt_count = attempt_count + 1,
             status = CASE
               WHEN $2::boolean THEN 'sent'
               WHEN $4::boolean AND attempt_count + 1 < max_attempts THEN 'pending'
               ELSE 'failed'
             END,
             last_error = CASE WHEN $2::boolean THEN last_error ELSE $3 END,
             sent_at = CASE WHEN $2::boolean THEN NOW() ELSE sent_at END,
             available_at = CASE
               WHEN NOT $2::boolean AND $4::boolean AND attempt_count + 1 < max_attempts
                 THEN NOW() + LEAST($5::double precision * POWER(2, attempt_count), $6::double precision) * INTERVAL '1 millisecond'
               ELSE available_at
             END,
             claimed_at = NULL,
             updated_at = NOW()
         WHERE id = $1 AND status = 'in_progress'
         RETURNING status`,
        [jobId, sent, reason, retryable, this.retryPolicy.retryDelayMs, this.retryPolicy.maxRetryDelayMs],
      ),
    );

    const row = result.rows[0];
    return row ? parseStatus(row.status) : null;
  }

  async recoverStaleClaims(staleAfterMs: number): Promise<string[]> {
    const result = await this.run("recover stale notification claims", () =>
      this.pool.query<{ id: string }>(
        `UPDATE notification_jobs
         SET status = 'pending', claimed_at = NULL, updated_at = NOW()
         WHERE status = 'in_progress'
           AND claimed_at < NOW() - $1::double precision * INTERVAL '1 millisecond'
         RETURNING id`,
        [staleAfterMs],
      ),
    );

    return result.rows.map((row) => row.id);
  }

  async getJob(jobId: string): Promise<NotificationJob | null> {
    const result = await this.run("load notification job", () =>
      this.pool.query<NotificationJobRow>(`SELECT ${JOB_COLUMNS} FROM notification_jobs WHERE id = $1`, [jobId]),
    );

    const row = result.rows[0];
    return row ? mapRowToJob(row) : null;
  }

  async listForRecipient(recipient: string, query: RecipientJobQuery = {}): Promise<NotificationJob[]> {
    const conditions = ["recipient = $1", "archived_at IS NULL"];
    const values: unknown[] = [recipient];
    let index = 2;

    if (query.channel) {
      conditions.push(`channel = $${index}`);
      values.push(query.channel);
      index += 1;
    }

    if (query.status) {
      conditions.push(`status = $${index}`);
      values.push(query.status);
      index += 1;
    }

    if (query.unreadOnly) {
      conditions.push("read_at IS NULL");
    }

    values.push(query.limit ?? DEFAULT_LIST_LIMIT);

    const result = await this.run("list recipient notifications", () =>
      this.pool.query<NotificationJobRow>(
        `SELECT ${JOB_COLUMNS} FROM notification_jobs
         WHERE ${conditions.join(" AND ")}
         ORDER BY created_at DESC
         LIMIT $${index}`,
        values,
      ),
    );

    return result.rows.map(mapRowToJob);
  }

  async markRead(jobId: string, recipient: string): Promise<boolean> {
    const result = await this.run("mark notification read", () =>
      this.pool.query(
        `UPDATE notification_jobs
         SET read_at = COALESCE(read_at, NOW())
         WHERE id = $1 AND recipient = $2 AND channel = 'in_app'
         RETURNING id`,
        [jobId, recipient],
      ),
    );

    return (result.rowCount ?? 0) > 0;
  }

  async archiveTerminal(olderThan: Date): Promise<number> {
    const result = await this.run("archive terminal notifications", () =>
      this.pool.query(
        `UPDATE notification_jobs
         SET archived_at = NOW()
         WHERE status IN ('sent', 'failed')
           AND archived_at IS NULL
           AND updated_at < $1`,
        [olderThan.toISOString()],
      ),
    );

    return result.rowCount ?? 0;
  }

  private async run<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof TransientStoreError) {
        throw error;
      }

      logger.error(`Failed to ${action}`, { backend: this.name, error });
      throw new TransientStoreError(`Failed to ${action}`, error);
    }
  }
}
