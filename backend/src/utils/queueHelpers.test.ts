import { afterEach, describe, expect, it, vi } from "vitest";

import { exponentialBackoff, mapWithConcurrency, withTimeout } from "./queueHelpers";

describe("exponentialBackoff", () => {
  it("should double from the base delay and stop at the cap", () => {
    expect([1, 2, 3, 4, 5].map((attempt) => exponentialBackoff(attempt, 1_000, 10_000))).toEqual([
      1_000, 2_000, 4_000, 8_000, 10_000,
    ]);
  });

  it("should treat attempt zero like the first attempt", () => {
    expect(exponentialBackoff(0, 500, 10_000)).toBe(500);
  });
});

describe("mapWithConcurrency", () => {
  it("should keep result order and never exceed the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (delay, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight -= 1;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it("should resolve to an empty list for no items", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should pass through a value that settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50, "too slow")).resolves.toBe("ok");
  });

  it("should reject once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<string>(() => undefined), 1_000, "too slow");
    const assertion = expect(pending).rejects.toThrow("too slow");

    await vi.advanceTimersByTimeAsync(1_000);

    await assertion;
  });
});
