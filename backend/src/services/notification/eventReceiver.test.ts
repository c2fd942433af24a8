import { beforeEach, describe, expect, it } from "vitest";

import { InMemoryQueueBackend } from "@/queue/backends/memoryQueue.backend";
import { InMemoryPreferenceStore } from "@/services/preferences/preference.service";
import { ValidationError } from "@/utils/errors";

import { EventReceiver } from "./eventReceiver";

describe("EventReceiver", () => {
  let backend: InMemoryQueueBackend;
  let preferences: InMemoryPreferenceStore;
  let receiver: EventReceiver;

  beforeEach(() => {
    backend = new InMemoryQueueBackend({
      retryPolicy: { maxAttempts: 3, inAppMaxAttempts: 2, retryDelayMs: 0, maxRetryDelayMs: 0 },
    });
    preferences = new InMemoryPreferenceStore();
    receiver = new EventReceiver({
      backend,
      preferences,
      helpers: { verificationUrl: (userId) => `https://app.example.test/verify?u=${userId}` },
    });
  });

  it("should enqueue one job per enabled channel, email first", async () => {
    const result = await receiver.onEvent("user-1", "user_registered", { email: "ada@example.test" });

    expect(result.skipped).toEqual([]);
    expect(result.jobIds).toHaveLength(2);

    const [email, inApp] = await Promise.all(result.jobIds.map((id) => backend.getJob(id)));
    expect(email).toMatchObject({ channel: "email", recipient: "user-1", eventType: "user_registered", status: "pending" });
    expect(email?.payload.subject).toBe("Welcome! Please verify your email");
    expect(inApp).toMatchObject({ channel: "in_app", eventType: "user_registered", maxAttempts: 2 });
  });

  it("should skip channels the recipient opted out of", async () => {
    await preferences.setPreference("user-1", "email", false);

    const result = await receiver.onEvent("user-1", "article_published", { articleId: 7, title: "Tides" });

    expect(result.skipped).toEqual(["email"]);
    expect(result.jobIds).toHaveLength(1);
    expect((await backend.getJob(result.jobIds[0]))?.channel).toBe("in_app");
  });

  it("should only enqueue the channels a template renders", async () => {
    const result = await receiver.onEvent("user-1", "email_verified", {});

    expect(result.jobIds).toHaveLength(1);
    expect(backend.size()).toBe(1);
  });

  it("should collapse repeated events sharing an idempotency key", async () => {
    const context = { articleId: "a-1", title: "Tides" };
    const first = await receiver.onEvent("user-1", "article_published", context, { idempotencyKey: "article:a-1" });
    const second = await receiver.onEvent("user-1", "article_published", context, { idempotencyKey: "article:a-1" });

    expect(second.jobIds).toEqual(first.jobIds);
    expect((await backend.getJob(first.jobIds[0]))?.idempotencyKey).toBe("article:a-1:email");
    expect(backend.size()).toBe(2);
  });

  it("should reject unknown event types", async () => {
    await expect(receiver.onEvent("user-1", "party", {})).rejects.toThrow(new ValidationError("Unknown event type: party"));
  });

  it("should reject an empty recipient", async () => {
    await expect(receiver.onEvent("  ", "email_verified", {})).rejects.toThrow("Recipient is required");
  });

  it("should reject an invalid context with a validation error", async () => {
    const failure = receiver.onEvent("user-1", "article_published", { articleId: 7 });

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow("Invalid context for article_published");
    expect(backend.size()).toBe(0);
  });
});
