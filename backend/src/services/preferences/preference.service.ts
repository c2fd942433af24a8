import type { QueryResultRow } from "pg";

import { config } from "@/config/config";
import type { SqlExecutor } from "@/database/connection";
import type { NotificationChannel } from "@/jobs/notificationJob";
import { NOTIFICATION_CHANNELS, isNotificationChannel } from "@/jobs/notificationJob";
import { pgPool } from "@/utils/clients";
import { TransientStoreError } from "@/utils/errors";
import { logger } from "@/utils/logger";

export interface ChannelPreference {
  channel: NotificationChannel;
  enabled: boolean;
  updatedAt: Date | null;
}

/**
 * Per-user, per-channel opt-out flags. A missing row means the channel is
 * enabled.
 */
export interface PreferenceStore {
  isEnabled(userId: string, channel: NotificationChannel): Promise<boolean>;
  getPreferences(userId: string): Promise<ChannelPreference[]>;
  setPreference(userId: string, channel: NotificationChannel, enabled: boolean): Promise<ChannelPreference>;
}

interface PreferenceRow {
  channel: string;
  enabled: boolean;
  updated_at: Date;
}

function withDefaults(userId: string, stored: ChannelPreference[]): ChannelPreference[] {
  const byChannel = new Map(stored.map((preference) => [preference.channel, preference]));
  logger.debug("Resolved channel preferences", { userId, stored: stored.length });

  return NOTIFICATION_CHANNELS.map(
    (channel) => byChannel.get(channel) ?? { channel, enabled: true, updatedAt: null },
  );
}

export class PostgresPreferenceStore implements PreferenceStore {
  constructor(private readonly pool: SqlExecutor) {}

  async isEnabled(userId: string, channel: NotificationChannel): Promise<boolean> {
    const result = await this.query<{ enabled: boolean }>(
      "read preference",
      "SELECT enabled FROM communication_preferences WHERE user_id = $1 AND channel = $2 LIMIT 1",
      [userId, channel],
    );

    return result.rows[0]?.enabled ?? true;
  }

  async getPreferences(userId: string): Promise<ChannelPreference[]> {
    const result = await this.query<PreferenceRow>(
      "read preferences",
      "SELECT channel, enabled, updated_at FROM communication_preferences WHERE user_id = $1",
      [userId],
    );

    const stored = result.rows.flatMap((row): ChannelPreference[] =>
      isNotificationChannel(row.channel) ? [{ channel: row.channel, enabled: row.enabled, updatedAt: row.updated_at }] : [],
    );

    return withDefaults(userId, stored);
  }

  async setPreference(userId: string, channel: NotificationChannel, enabled: boolean): Promise<ChannelPreference> {
    const result = await this.query<PreferenceRow>(
      "update preference",
      `INSERT INTO communication_preferences (user_id, channel, enabled)
       VALUES ($1, $2, $3)
       ON CONFLICT (user_id, channel)
       DO UPDATE SET enabled = EXCLUDED.enabled, updated_at = NOW()
       RETURNING channel, enabled, updated_at`,
      [userId, channel, enabled],
    );

    const row = result.rows[0];
    logger.info("Channel preference updated", { userId, channel, enabled });
    return { channel, enabled: row?.enabled ?? enabled, updatedAt: row?.updated_at ?? null };
  }

  private async query<T extends QueryResultRow>(action: string, text: string, values: unknown[]) {
    try {
      return await this.pool.query<T>(text, values);
    } catch (error) {
      logger.error(`Failed to ${action}`, { error });
      throw new TransientStoreError(`Failed to ${action}`, error);
    }
  }
}

export class InMemoryPreferenceStore implements PreferenceStore {
  private readonly preferences = new Map<string, ChannelPreference>();

  async isEnabled(userId: string, channel: NotificationChannel): Promise<boolean> {
    return this.preferences.get(key(userId, channel))?.enabled ?? true;
  }

  async getPreferences(userId: string): Promise<ChannelPreference[]> {
    const stored = NOTIFICATION_CHANNELS.flatMap((channel) => {
      const preference = this.preferences.get(key(userId, channel));
      return preference ? [{ ...preference }] : [];
    });

    return withDefaults(userId, stored);
  }

  async setPreference(userId: string, channel: NotificationChannel, enabled: boolean): Promise<ChannelPreference> {
    const preference: ChannelPreference = { channel, enabled, updatedAt: new Date() };
    this.preferences.set(key(userId, channel), preference);
    return { ...preference };
  }
}

function key(userId: string, channel: NotificationChannel) {
  return `${userId}:${channel}`;
}

let preferenceStore: PreferenceStore | null = null;

/** Process-wide store, paired with the configured queue backend. */
export function getPreferenceStore(): PreferenceStore {
  if (!preferenceStore) {
    preferenceStore = config.worker.backend === "memory" ? new InMemoryPreferenceStore() : new PostgresPreferenceStore(pgPool);
  }

  return preferenceStore;
}
