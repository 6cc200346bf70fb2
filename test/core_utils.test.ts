import { describe, expect, it, vi } from "vitest";
import { KeyedMutex } from "../src/core/concurrency.js";
import { backoffDelay, withRetry } from "../src/core/retry.js";
import { type ReviewRequest, ReviewQueue, ReviewWithdrawnError, awaitReview } from "../src/core/review.js";
import { SigningUnavailableError } from "../src/errors.js";
import { digestOf } from "./helpers.js";

function request(id: string): ReviewRequest {
  return {
    request_id: id,
    lifecycle_id: "lc-1",
    operation_id: "op-1",
    stage: "deployment",
    aggregate_status: "REVIEW",
    verdicts: [],
    recommendations: [],
    policy: { policy_id: "test-policy", version: "1.0.0", digest: digestOf("policy") },
    requested_at: "2026-03-01T00:00:00.000Z",
    deadline: "2026-03-01T01:00:00.000Z",
  };
}

describe("withRetry", () => {
  const noSleep = () => Promise.resolve();

  it("retries retryable errors with capped exponential backoff", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withRetry(
      async () => {
        if (++calls < 4) throw new SigningUnavailableError("busy");
        return "signed";
      },
      { attempts: 5, baseDelayMs: 10, maxDelayMs: 25, sleep: noSleep, onRetry: (_e, _a, d) => delays.push(d) },
    );

    expect(result).toBe("signed");
    expect(delays).toEqual([10, 20, 25]);
  });

  it("gives up after the last attempt", async () => {
    const fn = vi.fn(async () => {
      throw new SigningUnavailableError("down");
    });
    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 1, maxDelayMs: 1, sleep: noSleep })).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry permanent errors", async () => {
    const fn = vi.fn(async () => {
      throw new Error("bad input");
    });
    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 1, maxDelayMs: 1, sleep: noSleep })).rejects.toThrow("bad input");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("computes backoff per attempt", () => {
    const policy = { attempts: 5, baseDelayMs: 100, maxDelayMs: 2000 };
    expect([1, 2, 3, 5, 6].map((a) => backoffDelay(a, policy))).toEqual([100, 200, 400, 1600, 2000]);
  });
});

describe("KeyedMutex", () => {
  it("serializes callers on the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const slow = mutex.run("a", async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("first");
    });
    const fast = mutex.run("a", async () => {
      order.push("second");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["first", "second"]);
    expect(mutex.isLocked("a")).toBe(false);
  });

  it("does not hold distinct keys behind each other", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const slow = mutex.run("a", async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("a");
    });
    const other = mutex.run("b", async () => {
      order.push("b");
    });

    await Promise.all([slow, other]);
    expect(order).toEqual(["b", "a"]);
  });

  it("releases the key when the section throws", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("a", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.run("a", async () => "next")).toBe("next");
  });
});

describe("ReviewQueue", () => {
  it("hands waiting requests to whoever decides them", async () => {
    const queue = new ReviewQueue();
    const seen: string[] = [];
    queue.onRequest((r) => {
      seen.push(r.request_id);
      queue.decide(r.request_id, { reviewer_id: "reviewer-1", decision: "approve", rationale: "metrics checked" });
    });

    const result = await awaitReview(queue, request("rvw_1"), 1_000);

    expect(seen).toEqual(["rvw_1"]);
    expect(result).toEqual({
      kind: "decided",
      response: { reviewer_id: "reviewer-1", decision: "approve", rationale: "metrics checked" },
    });
    expect(queue.pending()).toEqual([]);
  });

  it("withdraws a request when the wait times out", async () => {
    const queue = new ReviewQueue();

    const result = await awaitReview(queue, request("rvw_2"), 5);

    expect(result).toEqual({ kind: "timeout" });
    expect(queue.pending()).toEqual([]);
    expect(queue.decide("rvw_2", { reviewer_id: "reviewer-1", decision: "approve", rationale: "late" })).toBe(false);
  });

  it("rejects a request whose signal is already aborted", async () => {
    const queue = new ReviewQueue();
    const controller = new AbortController();
    controller.abort();

    await expect(queue.requestReview(request("rvw_3"), controller.signal)).rejects.toBeInstanceOf(ReviewWithdrawnError);
  });

  it("stops notifying unsubscribed listeners", async () => {
    const queue = new ReviewQueue();
    const listener = vi.fn();
    const unsubscribe = queue.onRequest(listener);
    unsubscribe();

    const controller = new AbortController();
    const pending = queue.requestReview(request("rvw_4"), controller.signal);
    expect(listener).not.toHaveBeenCalled();
    expect(queue.pending().map((r) => r.request_id)).toEqual(["rvw_4"]);

    controller.abort();
    await expect(pending).rejects.toThrow("Review request rvw_4 was withdrawn");
  });
});
