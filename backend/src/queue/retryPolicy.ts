import type { NotificationChannel } from "@/jobs/notificationJob";
import { exponentialBackoff } from "@/utils/queueHelpers";

export interface RetryPolicy {
  maxAttempts: number;
  /** In-app pushes go stale quickly, so their ceiling is kept short. */
  inAppMaxAttempts: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
}

export function maxAttemptsFor(channel: NotificationChannel, policy: RetryPolicy): number {
  return channel === "in_app" ? policy.inAppMaxAttempts : policy.maxAttempts;
}

/** Delay before retry number `attempt` (1-based). */
export function retryDelayFor(attempt: number, policy: RetryPolicy): number {
  return exponentialBackoff(attempt, policy.retryDelayMs, policy.maxRetryDelayMs);
}
