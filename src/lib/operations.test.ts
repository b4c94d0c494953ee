import { APIErrorCode } from "@notionhq/client";
import { describe, expect, it, vi } from "vitest";
import { calculateBackoffDelay, collectPaginatedAPI, isRetryableError, retry, type PaginationArgs } from "./operations";

describe("operations", () => {
  describe("retry", () => {
    it("should return the result on first try", async () => {
      const fn = vi.fn().mockResolvedValue("success");

      await expect(retry({ fn, operation: "test-op", baseDelay: 1 })).resolves.toBe("success");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("should retry on retryable errors", async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce({ code: APIErrorCode.RateLimited })
        .mockRejectedValueOnce({ code: "ECONNRESET" })
        .mockResolvedValue("success");

      await expect(retry({ fn, operation: "test-op", maxRetries: 3, baseDelay: 1 })).resolves.toBe("success");
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it("should not retry on non-retryable errors", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("Not retryable"));

      await expect(retry({ fn, operation: "test-op", baseDelay: 1 })).rejects.toThrow("Not retryable");
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it("should give up after maxRetries", async () => {
      const fn = vi.fn().mockRejectedValue({ code: APIErrorCode.ServiceUnavailable });

      await expect(retry({ fn, operation: "test-op", maxRetries: 2, baseDelay: 1 })).rejects.toEqual({
        code: APIErrorCode.ServiceUnavailable
      });
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe("isRetryableError", () => {
    it("should recognise network codes on the error cause", () => {
      expect(isRetryableError({ cause: { code: "ETIMEDOUT" } })).toBe(true);
      expect(isRetryableError(new Error("socket hang up: ECONNRESET"))).toBe(true);
    });

    it("should reject validation errors", () => {
      expect(isRetryableError({ code: APIErrorCode.ValidationError })).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });
  });

  describe("calculateBackoffDelay", () => {
    it("should stay within the jitter bounds", () => {
      for (let i = 0; i < 20; i++) {
        const value = calculateBackoffDelay(2, 100);
        expect(value).toBeGreaterThanOrEqual(300);
        expect(value).toBeLessThanOrEqual(500);
      }
    });

    it("should cap at the max delay", () => {
      expect(calculateBackoffDelay(20, 1000, 2000)).toBeLessThanOrEqual(2500);
    });
  });

  describe("collectPaginatedAPI", () => {
    it("should follow cursors until has_more is false", async () => {
      const pages = [
        { results: [1, 2], next_cursor: "c1", has_more: true },
        { results: [3], next_cursor: null, has_more: false }
      ];
      const listFn = vi.fn(async (args: PaginationArgs & { id: string }) => {
        return args.start_cursor === "c1" ? pages[1] : pages[0];
      });

      const results = await collectPaginatedAPI(listFn, { id: "abc" }, 100);

      expect(results).toEqual([1, 2, 3]);
      expect(listFn).toHaveBeenCalledTimes(2);
      expect(listFn).toHaveBeenNthCalledWith(2, { id: "abc", start_cursor: "c1", page_size: 100 });
    });
  });
});
