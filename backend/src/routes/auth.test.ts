import { afterEach, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import type { FastifyInstance } from "fastify";

import { generateAccessToken, generateEmailVerificationToken } from "@/services/auth/jwtService";
import { buildServer, createTestDependencies, type TestDependencies } from "@/test/testServer";

describe("Auth Routes", () => {
  let deps: TestDependencies;
  let app: FastifyInstance;

  const verify = (token: string) =>
    request(app.server).get("/api/v1/auth/verify-email").query({ token });

  beforeEach(async () => {
    deps = createTestDependencies();
    deps.users.getUserContact.mockResolvedValue({ id: "user-1", email: "ada@example.test", isVerified: false });
    deps.users.markEmailVerified.mockResolvedValue(true);
    deps.notify.mockResolvedValue({ jobIds: ["job-1"], skipped: [] });
    app = await buildServer(deps);
  });

  afterEach(async () => {
    await app.close();
  });

  it("requires a token", async () => {
    const response = await request(app.server).get("/api/v1/auth/verify-email");

    expect(response.status).toBe(422);
    expect(response.body.error.message).toBe("Invalid request query");
  });

  it("rejects tokens that are not verification links", async () => {
    const response = await verify(generateAccessToken({ userId: "user-1" }));

    expect(response.status).toBe(400);
    expect(response.body.error).toMatchObject({ code: "INVALID_TOKEN", message: "Verification link is invalid" });
  });

  it("rejects links for unknown users", async () => {
    deps.users.getUserContact.mockResolvedValueOnce(null);

    const response = await verify(generateEmailVerificationToken("user-9"));

    expect(response.status).toBe(400);
    expect(deps.users.markEmailVerified).not.toHaveBeenCalled();
  });

  it("verifies the email and sends a confirmation", async () => {
    const response = await verify(generateEmailVerificationToken("user-1"));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: "Email successfully verified" });
    expect(deps.users.markEmailVerified).toHaveBeenCalledWith("user-1");
    expect(deps.notify).toHaveBeenCalledWith("user-1", "email_verified", { email: "ada@example.test" });
  });

  it("reports an address that was already verified", async () => {
    deps.users.getUserContact.mockResolvedValueOnce({ id: "user-1", email: "ada@example.test", isVerified: true });

    const response = await verify(generateEmailVerificationToken("user-1"));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: "Email has already been verified" });
    expect(deps.users.markEmailVerified).not.toHaveBeenCalled();
    expect(deps.notify).not.toHaveBeenCalled();
  });

  it("still succeeds when the confirmation cannot be queued", async () => {
    deps.notify.mockRejectedValueOnce(new Error("queue unavailable"));

    const response = await verify(generateEmailVerificationToken("user-1"));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: "Email successfully verified" });
  });
});
