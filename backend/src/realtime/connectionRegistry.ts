import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";

export const NOTIFICATION_EVENT = "notification";

export interface RealtimeMessage {
  type: typeof NOTIFICATION_EVENT;
  data: Record<string, unknown>;
}

/** One live client connection. `send` reports whether the message left the process. */
export interface ConnectionHandle {
  readonly id: string;
  isAlive(): boolean;
  send(message: RealtimeMessage): boolean | Promise<boolean>;
}

/**
 * Live connections per user. Handles that died without an explicit
 * `unregister` are pruned on the next push to that user.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, Map<string, ConnectionHandle>>();

  register(userId: string, handle: ConnectionHandle) {
    let handles = this.connections.get(userId);
    if (!handles) {
      handles = new Map();
      this.connections.set(userId, handles);
    }

    handles.set(handle.id, handle);
    logger.debug("Connection registered", { userId, handleId: handle.id, open: handles.size });
  }

  unregister(userId: string, handleId: string): boolean {
    const handles = this.connections.get(userId);
    if (!handles) {
      return false;
    }

    const removed = handles.delete(handleId);
    if (handles.size === 0) {
      this.connections.delete(userId);
    }

    if (removed) {
      logger.debug("Connection unregistered", { userId, handleId });
    }

    return removed;
  }

  /** Sends to every live handle of the user; resolves to the number that accepted the message. */
  async push(userId: string, message: RealtimeMessage): Promise<number> {
    const handles = this.connections.get(userId);
    if (!handles) {
      return 0;
    }

    const targets = [...handles.values()];
    const results = await Promise.all(
      targets.map(async (handle) => {
        if (!handle.isAlive()) {
          this.unregister(userId, handle.id);
          return false;
        }

        try {
          return await handle.send(message);
        } catch (error) {
          logger.warn("Push to connection failed", { userId, handleId: handle.id, error: errorMessage(error) });
          return false;
        }
      }),
    );

    return results.filter(Boolean).length;
  }

  countFor(userId: string): number {
    return this.connections.get(userId)?.size ?? 0;
  }

  size(): number {
    let total = 0;
    for (const handles of this.connections.values()) {
      total += handles.size;
    }

    return total;
  }

  clear() {
    this.connections.clear();
  }
}
