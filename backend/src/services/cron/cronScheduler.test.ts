import { beforeEach, describe, expect, it, vi } from "vitest";

import { InMemoryQueueBackend } from "@/queue/backends/memoryQueue.backend";

import { ARCHIVE_SCHEDULE, STALE_SWEEP_SCHEDULE, isRunning, startCronJobs, stopCronJobs } from "./cronScheduler";
import { runJobArchive } from "./jobs/jobArchive";
import { runStaleClaimSweep } from "./jobs/staleClaimSweep";

const { mockSchedule, mockStop } = vi.hoisted(() => ({
  mockSchedule: vi.fn(),
  mockStop: vi.fn(),
}));

vi.mock("node-cron", () => ({
  default: {
    schedule: mockSchedule,
  },
}));

vi.mock("./jobs/staleClaimSweep", () => ({
  runStaleClaimSweep: vi.fn().mockResolvedValue([]),
}));

vi.mock("./jobs/jobArchive", () => ({
  runJobArchive: vi.fn().mockResolvedValue(0),
}));

const context = {
  backend: new InMemoryQueueBackend({
    retryPolicy: { maxAttempts: 3, inAppMaxAttempts: 2, retryDelayMs: 0, maxRetryDelayMs: 0 },
  }),
  staleAfterMs: 300_000,
  archiveAfterDays: 30,
};

describe("cronScheduler", () => {
  beforeEach(() => {
    stopCronJobs();
    vi.clearAllMocks();
    mockSchedule.mockReturnValue({ stop: mockStop });
  });

  it("should schedule the stale sweep and the archive in UTC", () => {
    expect(isRunning()).toBe(false);
    startCronJobs(context);

    expect(isRunning()).toBe(true);
    expect(mockSchedule).toHaveBeenCalledTimes(2);
    expect(mockSchedule).toHaveBeenCalledWith(STALE_SWEEP_SCHEDULE, expect.any(Function), {
      scheduled: true,
      timezone: "UTC",
    });
    expect(mockSchedule).toHaveBeenCalledWith(ARCHIVE_SCHEDULE, expect.any(Function), {
      scheduled: true,
      timezone: "UTC",
    });
  });

  it("should run the maintenance jobs against the given backend", async () => {
    startCronJobs(context);

    const [sweepTick, archiveTick] = mockSchedule.mock.calls.map((call) => call[1]);
    await sweepTick();
    await archiveTick();

    expect(runStaleClaimSweep).toHaveBeenCalledWith(context.backend, 300_000);
    expect(runJobArchive).toHaveBeenCalledWith(context.backend, 30);
  });

  it("should keep the scheduler alive when a job fails", async () => {
    vi.mocked(runStaleClaimSweep).mockRejectedValueOnce(new Error("store down"));
    startCronJobs(context);

    const sweepTick = mockSchedule.mock.calls[0][1];

    await expect(sweepTick()).resolves.toBeUndefined();
    expect(isRunning()).toBe(true);
  });

  it("should stop every scheduled task", () => {
    startCronJobs(context);
    stopCronJobs();

    expect(mockStop).toHaveBeenCalledTimes(2);
    expect(isRunning()).toBe(false);
  });

  it("should not start twice", () => {
    startCronJobs(context);
    startCronJobs(context);

    expect(mockSchedule).toHaveBeenCalledTimes(2);
  });

  it("should handle stop when not running", () => {
    expect(isRunning()).toBe(false);
    stopCronJobs();
    expect(isRunning()).toBe(false);
  });
});
