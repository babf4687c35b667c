import { describe, it, expect, vi } from "vitest";
import { backoffDelay, withRetry } from "../retry.js";

describe("backoffDelay", () => {
  it("doubles from the base delay up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, 500, 4_000))).toEqual([
      500, 1_000, 2_000, 4_000, 4_000,
    ]);
  });
});

describe("withRetry", () => {
  const options = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000 };

  it("returns the first successful result", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { ...options, shouldRetry: () => true, sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it("rethrows the last error once attempts run out", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { ...options, shouldRetry: () => true, sleep })).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("does not retry errors the predicate rejects", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error("permanent");
    });

    await expect(
      withRetry(fn, { ...options, shouldRetry: () => false, sleep, onRetry })
    ).rejects.toThrow("permanent");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(onRetry).not.toHaveBeenCalled();
  });
});
