import { describe, it, expect, vi, afterEach } from "vitest";
import {
  backoffDelay,
  createTaggedError,
  errorKind,
  isRetryable,
  withRetry,
} from "../src/core/Retry.js";

describe("Retry", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("backoffDelay", () => {
    it("doubles from the base and stops at the cap", () => {
      expect([1, 2, 3, 4, 5, 6].map((n) => backoffDelay(n, 1000, 16_000))).toEqual([
        1000, 2000, 4000, 8000, 16_000, 16_000,
      ]);
    });
  });

  describe("tagged errors", () => {
    it("carries kind and details", () => {
      const err = createTaggedError("SETUP_ERROR", "pip failed", { code: 1 });
      expect(err).toBeInstanceOf(Error);
      expect(err.message).toBe("pip failed");
      expect(errorKind(err)).toBe("SETUP_ERROR");
      expect(err.details).toEqual({ code: 1 });
    });

    it("classifies deterministic kinds as not retryable", () => {
      expect(isRetryable(createTaggedError("CALLBACK_REJECTED", "400"))).toBe(false);
      expect(isRetryable(createTaggedError("DEADLINE_EXCEEDED", "late"))).toBe(false);
      expect(isRetryable(createTaggedError("DELIVERY_FAILURE", "503"))).toBe(true);
      expect(isRetryable(new Error("plain"))).toBe(true);
    });
  });

  describe("withRetry", () => {
    it("retries until success and reports each delay", async () => {
      vi.useFakeTimers();
      const delays: number[] = [];
      let calls = 0;
      const promise = withRetry(
        async (attempt) => {
          calls++;
          if (attempt < 3) throw createTaggedError("UPSTREAM_ERROR", `fail ${attempt}`);
          return "done";
        },
        { maxRetries: 4, baseDelayMs: 100, maxDelayMs: 1000, onRetry: (_e, _a, delay) => delays.push(delay) },
      );
      await vi.runAllTimersAsync();
      await expect(promise).resolves.toBe("done");
      expect(calls).toBe(3);
      expect(delays).toEqual([100, 200]);
    });

    it("stops at once on a non-retryable error", async () => {
      let calls = 0;
      await expect(
        withRetry(
          async () => {
            calls++;
            throw createTaggedError("CALLBACK_REJECTED", "bad request");
          },
          { maxRetries: 3, baseDelayMs: 1 },
        ),
      ).rejects.toThrow("bad request");
      expect(calls).toBe(1);
    });

    it("honors shouldRetry", async () => {
      let calls = 0;
      await expect(
        withRetry(
          async () => {
            calls++;
            throw new Error("nope");
          },
          { maxRetries: 3, baseDelayMs: 1, shouldRetry: () => false },
        ),
      ).rejects.toThrow("nope");
      expect(calls).toBe(1);
    });
  });
});
