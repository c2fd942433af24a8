export const NOTIFICATION_CHANNELS = ["email", "in_app"] as const;
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export const JOB_STATUSES = ["pending", "in_progress", "sent", "failed"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["sent", "failed"]);

export function isNotificationChannel(value: unknown): value is NotificationChannel {
  return NOTIFICATION_CHANNELS.some((channel) => channel === value);
}

export type EmailPayload = {
  subject: string;
  bodyText: string;
  bodyHtml?: string;
  metadata?: Record<string, unknown>;
};

export type InAppPayload = {
  title: string;
  body: string;
  link?: string;
  metadata?: Record<string, unknown>;
};

export type ChannelPayloadMap = {
  email: EmailPayload;
  in_app: InAppPayload;
};

export type NotificationPayload = ChannelPayloadMap[NotificationChannel];

export interface NotificationJob {
  id: string;
  recipient: string;
  channel: NotificationChannel;
  eventType: string;
  payload: Record<string, unknown>;
  status: JobStatus;
  attemptCount: number;
  maxAttempts: number;
  lastError: string | null;
  idempotencyKey: string | null;
  availableAt: Date;
  claimedAt: Date | null;
  sentAt: Date | null;
  readAt: Date | null;
  archivedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface EnqueueInput<C extends NotificationChannel = NotificationChannel> {
  recipient: string;
  channel: C;
  payload: ChannelPayloadMap[C];
  eventType?: string;
  idempotencyKey?: string;
}

export type DeliveryResult =
  | { ok: true }
  | { ok: false; reason: string; retryable: boolean };

/** What the worker records for one claimed job. */
export type DeliveryOutcome =
  | { status: "sent" }
  | { status: "failed"; reason: string; retryable: boolean };

export interface RecipientJobQuery {
  channel?: NotificationChannel;
  status?: JobStatus;
  unreadOnly?: boolean;
  limit?: number;
}

export const DEFAULT_EVENT_TYPE = "general";
