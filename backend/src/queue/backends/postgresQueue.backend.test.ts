import { beforeEach, describe, expect, it, vi } from "vitest";

import { TransientStoreError } from "@/utils/errors";

import { PostgresQueueBackend, mapRowToJob } from "./postgresQueue.backend";

const createdAt = new Date("2026-01-01T00:00:00.000Z");

type JobRow = Parameters<typeof mapRowToJob>[0];

const row = (overrides: Partial<JobRow> = {}): JobRow => ({
  id: "job-1",
  recipient: "user-1",
  channel: "email",
  event_type: "general",
  payload: { subject: "Hello", bodyText: "Body" },
  status: "in_progress",
  attempt_count: 0,
  max_attempts: 3,
  last_error: null,
  idempotency_key: null,
  available_at: createdAt,
  claimed_at: createdAt,
  sent_at: null,
  read_at: null,
  archived_at: null,
  created_at: createdAt,
  updated_at: createdAt,
  ...overrides,
});

describe("PostgresQueueBackend", () => {
  const query = vi.fn();
  let backend: PostgresQueueBackend;

  beforeEach(() => {
    query.mockReset();
    backend = new PostgresQueueBackend(
      { query },
      { maxAttempts: 3, inAppMaxAttempts: 2, retryDelayMs: 30_000, maxRetryDelayMs: 600_000 },
    );
  });

  describe("enqueue", () => {
    it("should insert a pending job with the channel's attempt ceiling", async () => {
      query.mockResolvedValueOnce({ rows: [{ id: "job-1" }] });

      const id = await backend.enqueue({
        recipient: "user-1",
        channel: "in_app",
        eventType: "email_verified",
        payload: { title: "Email verified", body: "Thanks" },
        idempotencyKey: "verify:user-1:in_app",
      });

      expect(id).toBe("job-1");
      expect(query).toHaveBeenCalledTimes(1);
      expect(query).toHaveBeenCalledWith(expect.stringContaining("ON CONFLICT (idempotency_key) DO NOTHING"), [
        "user-1",
        "in_app",
        "email_verified",
        JSON.stringify({ title: "Email verified", body: "Thanks" }),
        2,
        "verify:user-1:in_app",
      ]);
    });

    it("should return the existing id when the idempotency key is taken", async () => {
      query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [{ id: "job-existing" }] });

      const id = await backend.enqueue({
        recipient: "user-1",
        channel: "email",
        payload: { subject: "Hello", bodyText: "Body" },
        idempotencyKey: "welcome:user-1:email",
      });

      expect(id).toBe("job-existing");
      expect(query).toHaveBeenLastCalledWith(expect.stringContaining("WHERE idempotency_key = $1"), [
        "welcome:user-1:email",
      ]);
    });
  });

  describe("fetchBatch", () => {
    it("should claim rows with SKIP LOCKED in a single statement", async () => {
      query.mockResolvedValueOnce({ rows: [row()] });

      const jobs = await backend.fetchBatch(5);

      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({ id: "job-1", channel: "email", status: "in_progress", eventType: "general" });

      const [sql, values] = query.mock.calls[0];
      expect(sql).toContain("FOR UPDATE SKIP LOCKED");
      expect(sql).toContain("SET status = 'in_progress'");
      expect(values).toEqual([5]);
    });

    it("should not touch the database for an empty batch size", async () => {
      await expect(backend.fetchBatch(0)).resolves.toEqual([]);
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe("markResult", () => {
    it("should guard the update on the in-progress status", async () => {
      query.mockResolvedValueOnce({ rows: [{ status: "pending" }] });

      const status = await backend.markResult("job-1", { status: "failed", reason: "smtp timeout", retryable: true });

      expect(status).toBe("pending");
      const [sql, values] = query.mock.calls[0];
      expect(sql).toContain("WHERE id = $1 AND status = 'in_progress'");
      expect(values).toEqual(["job-1", false, "smtp timeout", true, 30_000, 600_000]);
    });

    it("should resolve to null when the job was no longer in progress", async () => {
      query.mockResolvedValueOnce({ rows: [] });

      await expect(backend.markResult("job-1", { status: "sent" })).resolves.toBeNull();
      expect(query.mock.calls[0][1]).toEqual(["job-1", true, null, false, 30_000, 600_000]);
    });
  });

  describe("listForRecipient", () => {
    it("should add placeholders only for the filters given", async () => {
      query.mockResolvedValueOnce({ rows: [row({ channel: "in_app", status: "sent", payload: '{"title":"T","body":"B"}' })] });

      const jobs = await backend.listForRecipient("user-1", { channel: "in_app", unreadOnly: true, limit: 10 });

      expect(jobs[0].payload).toEqual({ title: "T", body: "B" });
      const [sql, values] = query.mock.calls[0];
      expect(sql).toContain("recipient = $1 AND archived_at IS NULL AND channel = $2 AND read_at IS NULL");
      expect(sql).toContain("ORDER BY created_at DESC");
      expect(sql).toContain("LIMIT $3");
      expect(values).toEqual(["user-1", "in_app", 10]);
    });
  });

  it("should report affected row counts for markRead and archiveTerminal", async () => {
    query.mockResolvedValueOnce({ rows: [{ id: "job-1" }], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 4 });

    await expect(backend.markRead("job-1", "user-1")).resolves.toBe(true);
    expect(query.mock.calls[0][0]).toContain("SET read_at = COALESCE(read_at, NOW())");
    expect(query.mock.calls[0][0]).not.toContain("updated_at");
    await expect(backend.archiveTerminal(createdAt)).resolves.toBe(4);
    expect(query).toHaveBeenLastCalledWith(expect.stringContaining("status IN ('sent', 'failed')"), [
      createdAt.toISOString(),
    ]);
  });

  it("should wrap driver failures in a transient store error", async () => {
    query.mockRejectedValueOnce(new Error("connection terminated"));

    const failure = backend.recoverStaleClaims(300_000);

    await expect(failure).rejects.toBeInstanceOf(TransientStoreError);
    await expect(failure).rejects.toThrow("Failed to recover stale notification claims");
  });
});

describe("mapRowToJob", () => {
  it("should reject rows with an unknown channel", () => {
    expect(() => mapRowToJob(row({ channel: "sms" }))).toThrow("Unknown notification channel: sms");
  });
});
