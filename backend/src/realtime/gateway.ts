import type { Server as HttpServer } from "node:http";

import { Server, type Socket } from "socket.io";
import { z } from "zod";

import type { NotificationBackend } from "@/queue/backends/backend";
import { toRealtimeMessage } from "@/queue/jobHandlers/inApp.handler";
import { NOTIFICATION_EVENT, type ConnectionRegistry } from "@/realtime/connectionRegistry";
import { verifyAccessToken } from "@/services/auth/jwtService";
import { errorMessage } from "@/utils/errors";
import { logger } from "@/utils/logger";

export const MISSED_EVENT = "notification:missed";
export const ACK_EVENT = "notification:ack";

const BEARER_PREFIX = "bearer ";

export interface AckResult {
  ok: boolean;
  error?: string;
}

export interface ServerToClientEvents {
  [NOTIFICATION_EVENT]: (data: Record<string, unknown>) => void;
  [MISSED_EVENT]: (notifications: Record<string, unknown>[]) => void;
}

export interface ClientToServerEvents {
  [ACK_EVENT]: (payload: unknown, ack?: (result: AckResult) => void) => void;
}

export interface SocketData {
  userId: string;
}

type GatewayServer = Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;
type GatewaySocket = Socket<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;

export interface GatewayOptions {
  registry: ConnectionRegistry;
  backend: NotificationBackend;
  jwtSecret: string;
  path: string;
  replayLimit: number;
  corsOrigins?: boolean | string[];
}

const ackSchema = z.object({ jobId: z.string().uuid() });

function extractToken(socket: GatewaySocket): string | null {
  const fromAuth: unknown = socket.handshake.auth.token;
  if (typeof fromAuth === "string" && fromAuth.length > 0) {
    return fromAuth;
  }

  const authorization = socket.handshake.headers.authorization;
  if (authorization?.toLowerCase().startsWith(BEARER_PREFIX)) {
    const token = authorization.slice(BEARER_PREFIX.length).trim();
    return token.length > 0 ? token : null;
  }

  return null;
}

/**
 * socket.io front door for in-app notifications. Authenticated sockets are
 * registered in the shared registry so the in-app handler can reach them.
 */
export class RealtimeGateway {
  private io: GatewayServer | null = null;

  constructor(private readonly options: GatewayOptions) {}

  attach(httpServer: HttpServer): GatewayServer {
    if (this.io) {
      return this.io;
    }

    const io: GatewayServer = new Server(httpServer, {
      path: this.options.path,
      cors: { origin: this.options.corsOrigins ?? true, credentials: true },
    });

    io.use((socket, next) => {
      const token = extractToken(socket);
      if (!token) {
        next(new Error("Unauthorized"));
        return;
      }

      try {
        socket.data.userId = verifyAccessToken(token, this.options.jwtSecret).sub;
        next();
      } catch (error) {
        logger.warn("Realtime handshake rejected", { socketId: socket.id, error: errorMessage(error) });
        next(new Error("Unauthorized"));
      }
    });

    io.on("connection", (socket) => {
      void this.handleConnection(socket);
    });

    this.io = io;
    logger.info("Realtime gateway attached", { path: this.options.path });
    return io;
  }

  private async handleConnection(socket: GatewaySocket) {
    const { userId } = socket.data;
    const { registry } = this.options;

    registry.register(userId, {
      id: socket.id,
      isAlive: () => socket.connected,
      send: (message) => socket.emit(message.type, message.data),
    });

    socket.on("disconnect", (reason) => {
      registry.unregister(userId, socket.id);
      logger.debug("Realtime socket disconnected", { userId, socketId: socket.id, reason });
    });

    socket.on(ACK_EVENT, (payload, ack) => {
      void this.acknowledge(userId, payload).then((result) => ack?.(result));
    });

    logger.info("Realtime socket connected", { userId, socketId: socket.id });
    await this.replayMissed(socket, userId);
  }

  private async replayMissed(socket: GatewaySocket, userId: string) {
    if (this.options.replayLimit === 0) {
      return;
    }

    try {
      const missed = await this.options.backend.listForRecipient(userId, {
        channel: "in_app",
        status: "sent",
        unreadOnly: true,
        limit: this.options.replayLimit,
      });

      if (missed.length === 0 || !socket.connected) {
        return;
      }

      // Listings come newest first; replay the window oldest first.
      const ordered = [...missed].reverse();
      socket.emit(
        MISSED_EVENT,
        ordered.map((job) => toRealtimeMessage(job).data),
      );
      await Promise.all(ordered.map((job) => this.options.backend.markRead(job.id, userId)));
      logger.debug("Replayed unread notifications", { userId, count: ordered.length });
    } catch (error) {
      logger.warn("Failed to replay unread notifications", { userId, error: errorMessage(error) });
    }
  }

  private async acknowledge(userId: string, payload: unknown): Promise<AckResult> {
    const parsed = ackSchema.safeParse(payload);
    if (!parsed.success) {
      return { ok: false, error: "a valid jobId is required" };
    }

    try {
      const ok = await this.options.backend.markRead(parsed.data.jobId, userId);
      return ok ? { ok } : { ok, error: "notification not found" };
    } catch (error) {
      logger.warn("Failed to acknowledge notification", { userId, jobId: parsed.data.jobId, error: errorMessage(error) });
      return { ok: false, error: "acknowledgement failed" };
    }
  }

  /** Disconnects every socket; the HTTP server itself stays with its owner. */
  async close() {
    if (!this.io) {
      return;
    }

    this.io.disconnectSockets(true);
    this.io.engine.close();
    this.io = null;
    this.options.registry.clear();
    logger.info("Realtime gateway closed");
  }
}
