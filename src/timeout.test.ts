import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "./types.js";

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve with the value when no deadline is set", async () => {
    await expect(withTimeout(Promise.resolve(5), undefined, "ZCARD")).resolves.toBe(5);
  });

  it("should resolve with the value when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve("OK"), 100, "FLUSHALL")).resolves.toBe("OK");
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should pass rejections through", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 100, "DEL")).rejects.toThrow("boom");
  });

  it("should reject with TimeoutError once the deadline passes", async () => {
    const pending = withTimeout(new Promise<number>(() => {}), 50, "INCR todo:id");
    const assertion = expect(pending).rejects.toThrow(TimeoutError);

    await vi.advanceTimersByTimeAsync(50);

    await assertion;
    await expect(pending).rejects.toThrow("INCR todo:id timed out after 50ms");
    expect(vi.getTimerCount()).toBe(0);
  });
});
