import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { settleWithin } from "./lifecycle.ts";

describe("settleWithin", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves true when the promise settles in time", async () => {
    await expect(settleWithin(Promise.resolve("done"), 1000)).resolves.toBe(true);
  });

  it("resolves false on timeout", async () => {
    const result = settleWithin(new Promise(() => {}), 1000);
    await vi.advanceTimersByTimeAsync(1000);
    await expect(result).resolves.toBe(false);
  });
});
