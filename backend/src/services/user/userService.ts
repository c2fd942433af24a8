import type { SqlExecutor } from "@/database/connection";
import type { UserContact } from "@/types/user";
import { TransientStoreError } from "@/utils/errors";
import { logger } from "@/utils/logger";

interface UserRow {
  id: string;
  email: string | null;
  is_verified: boolean | null;
}

/** Read/verify access to the account service's `users` table. */
export interface UserDirectory {
  getUserContact(userId: string): Promise<UserContact | null>;
  /** Resolves to false when the user was already verified or does not exist. */
  markEmailVerified(userId: string): Promise<boolean>;
}

function mapUserRow(row: UserRow): UserContact {
  const email = row.email?.trim();

  return {
    id: row.id,
    email: email ? email : null,
    isVerified: row.is_verified ?? false,
  };
}

export class PostgresUserDirectory implements UserDirectory {
  constructor(private readonly pool: SqlExecutor) {}

  async getUserContact(userId: string): Promise<UserContact | null> {
    try {
      const result = await this.pool.query<UserRow>("SELECT id, email, is_verified FROM users WHERE id = $1 LIMIT 1", [
        userId,
      ]);

      const row = result.rows[0];
      return row ? mapUserRow(row) : null;
    } catch (error) {
      logger.error("Failed to load user contact", { userId, error });
      throw new TransientStoreError("Failed to load user contact", error);
    }
  }

  async markEmailVerified(userId: string): Promise<boolean> {
    try {
      const result = await this.pool.query(
        "UPDATE users SET is_verified = TRUE, updated_at = NOW() WHERE id = $1 AND is_verified = FALSE RETURNING id",
        [userId],
      );

      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      logger.error("Failed to mark email verified", { userId, error });
      throw new TransientStoreError("Failed to mark email verified", error);
    }
  }
}
