import { afterEach, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import type { FastifyInstance } from "fastify";

import { buildAuthHeader, buildServer, createTestDependencies, type TestDependencies } from "@/test/testServer";

describe("Notification Routes", () => {
  let deps: TestDependencies;
  let app: FastifyInstance;

  const enqueue = (recipient: string, channel: "email" | "in_app") =>
    channel === "email"
      ? deps.backend.enqueue({ recipient, channel, payload: { subject: "Hello", bodyText: "Body" } })
      : deps.backend.enqueue({ recipient, channel, payload: { title: "Hello", body: "Body" } });

  beforeEach(async () => {
    deps = createTestDependencies();
    app = await buildServer(deps);
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /api/v1/notifications", () => {
    it("returns 401 when not authenticated", async () => {
      const response = await request(app.server).get("/api/v1/notifications");

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe("AUTH_ERROR");
    });

    it("lists only the caller's notifications", async () => {
      const emailId = await enqueue("user-1", "email");
      const inAppId = await enqueue("user-1", "in_app");
      await enqueue("user-2", "in_app");

      const response = await request(app.server)
        .get("/api/v1/notifications")
        .set("Authorization", buildAuthHeader("user-1"))
        .set("x-request-id", "req-1");

      expect(response.status).toBe(200);
      expect(response.body.requestId).toBe("req-1");
      expect(response.body.data.map((job: { id: string }) => job.id)).toEqual([inAppId, emailId]);
      expect(response.body.data[1]).toMatchObject({
        channel: "email",
        eventType: "general",
        status: "pending",
        attemptCount: 0,
        lastError: null,
        sentAt: null,
        readAt: null,
        payload: { subject: "Hello", bodyText: "Body" },
      });
    });

    it("filters by channel and unread state", async () => {
      await enqueue("user-1", "email");
      const inAppId = await enqueue("user-1", "in_app");

      const response = await request(app.server)
        .get("/api/v1/notifications?channel=in_app&unread=true")
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(200);
      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0].id).toBe(inAppId);
    });

    it("returns the newest notifications when there are more than the limit", async () => {
      const ids: string[] = [];
      for (let index = 0; index < 5; index += 1) {
        ids.push(await enqueue("user-1", "in_app"));
      }

      const response = await request(app.server)
        .get("/api/v1/notifications?limit=3")
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(200);
      expect(response.body.data.map((job: { id: string }) => job.id)).toEqual([ids[4], ids[3], ids[2]]);
    });

    it("rejects an out-of-range limit", async () => {
      const response = await request(app.server)
        .get("/api/v1/notifications?limit=0")
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(422);
      expect(response.body.error.message).toBe("Invalid request query");
    });
  });

  describe("POST /api/v1/notifications/:id/read", () => {
    it("marks the caller's in-app notification as read", async () => {
      const id = await enqueue("user-1", "in_app");

      const response = await request(app.server)
        .post(`/api/v1/notifications/${id}/read`)
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true });
      expect((await deps.backend.getJob(id))?.readAt).toBeInstanceOf(Date);
    });

    it("returns 404 for someone else's notification", async () => {
      const id = await enqueue("user-2", "in_app");

      const response = await request(app.server)
        .post(`/api/v1/notifications/${id}/read`)
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe("NOT_FOUND");
    });

    it("rejects an id that is not a notification id", async () => {
      const response = await request(app.server)
        .post("/api/v1/notifications/abc/read")
        .set("Authorization", buildAuthHeader("user-1"));

      expect(response.status).toBe(422);
      expect(response.body.error.message).toBe("Invalid request params");
    });
  });
});
