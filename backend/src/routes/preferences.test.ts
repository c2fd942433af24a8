import { afterEach, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import type { FastifyInstance } from "fastify";

import { generateEmailVerificationToken } from "@/services/auth/jwtService";
import { buildAuthHeader, buildServer, createTestDependencies, type TestDependencies } from "@/test/testServer";

describe("Preference Routes", () => {
  let deps: TestDependencies;
  let app: FastifyInstance;

  beforeEach(async () => {
    deps = createTestDependencies();
    app = await buildServer(deps);
  });

  afterEach(async () => {
    await app.close();
  });

  it("returns every channel enabled by default", async () => {
    const response = await request(app.server).get("/api/v1/preferences").set("Authorization", buildAuthHeader("user-1"));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      data: [
        { channel: "email", enabled: true, updatedAt: null },
        { channel: "in_app", enabled: true, updatedAt: null },
      ],
    });
  });

  it("stores an opt-out for the caller", async () => {
    const response = await request(app.server)
      .put("/api/v1/preferences/email")
      .set("Authorization", buildAuthHeader("user-1"))
      .send({ enabled: false });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ channel: "email", enabled: false });
    await expect(deps.preferences.isEnabled("user-1", "email")).resolves.toBe(false);
    await expect(deps.preferences.isEnabled("user-2", "email")).resolves.toBe(true);
  });

  it("rejects unknown channels and malformed bodies", async () => {
    const unknownChannel = await request(app.server)
      .put("/api/v1/preferences/sms")
      .set("Authorization", buildAuthHeader("user-1"))
      .send({ enabled: false });
    const malformed = await request(app.server)
      .put("/api/v1/preferences/email")
      .set("Authorization", buildAuthHeader("user-1"))
      .send({ enabled: "no" });

    expect(unknownChannel.status).toBe(422);
    expect(unknownChannel.body.error.message).toBe("Invalid request params");
    expect(malformed.status).toBe(422);
    expect(malformed.body.error.message).toBe("Invalid request body");
  });

  it("does not accept verification links as access tokens", async () => {
    const response = await request(app.server)
      .get("/api/v1/preferences")
      .set("Authorization", `Bearer ${generateEmailVerificationToken("user-1")}`);

    expect(response.status).toBe(401);
  });
});
