import type { GateStatus, VerdictSummary } from "../types/gate.js";
import type { PolicyRef } from "../types/policy.js";
import type { ReviewDecision } from "../types/receipt.js";
import type { Stage } from "../types/stage.js";

export type ReviewRequest = {
  request_id: string;
  lifecycle_id: string;
  operation_id: string;
  stage: Stage;
  aggregate_status: GateStatus;
  verdicts: VerdictSummary[];
  recommendations: string[];
  policy: PolicyRef;
  requested_at: string;
  deadline: string;
};

export type ReviewResponse = {
  /** Entity id of the reviewer; the review receipt is signed with this entity's key. */
  reviewer_id: string;
  decision: ReviewDecision;
  rationale: string;
};

/**
 * Source of human decisions for escalated stages. The signal aborts when the
 * orchestrator stops waiting.
 */
export interface ReviewProvider {
  requestReview(request: ReviewRequest, signal: AbortSignal): Promise<ReviewResponse>;
}

export type ReviewResult = { kind: "decided"; response: ReviewResponse } | { kind: "timeout" };

/** Wait for a decision, giving up after `timeoutMs`. */
export async function awaitReview(provider: ReviewProvider, request: ReviewRequest, timeoutMs: number): Promise<ReviewResult> {
  const controller = new AbortController();
  let expire: () => void = () => undefined;
  const expired = new Promise<ReviewResult>((resolve) => {
    expire = () => resolve({ kind: "timeout" });
  });
  const timer = setTimeout(() => {
    expire();
    controller.abort();
  }, timeoutMs);

  try {
    return await Promise.race([
      provider.requestReview(request, controller.signal).then((response): ReviewResult => ({ kind: "decided", response })),
      expired,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

type Waiting = {
  request: ReviewRequest;
  resolve: (response: ReviewResponse) => void;
};

export class ReviewWithdrawnError extends Error {
  constructor(readonly requestId: string) {
    super(`Review request ${requestId} was withdrawn`);
    this.name = "ReviewWithdrawnError";
  }
}

/** In-process review provider: requests wait here until someone calls `decide`. */
export class ReviewQueue implements ReviewProvider {
  private readonly waiting = new Map<string, Waiting>();
  private readonly listeners = new Set<(request: ReviewRequest) => void>();

  requestReview(request: ReviewRequest, signal: AbortSignal): Promise<ReviewResponse> {
    return new Promise<ReviewResponse>((resolve, reject) => {
      if (signal.aborted) {
        reject(new ReviewWithdrawnError(request.request_id));
        return;
      }
      this.waiting.set(request.request_id, { request, resolve });
      signal.addEventListener(
        "abort",
        () => {
          if (this.waiting.delete(request.request_id)) reject(new ReviewWithdrawnError(request.request_id));
        },
        { once: true },
      );
      for (const listener of this.listeners) listener(request);
    });
  }

  /** Subscribe to new requests. Returns the unsubscribe function. */
  onRequest(listener: (request: ReviewRequest) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  pending(): ReviewRequest[] {
    return [...this.waiting.values()].map((w) => w.request);
  }

  /** Resolve a waiting request. False when it is unknown, already decided, or withdrawn. */
  decide(requestId: string, response: ReviewResponse): boolean {
    const waiting = this.waiting.get(requestId);
    if (!waiting) return false;
    this.waiting.delete(requestId);
    waiting.resolve(response);
    return true;
  }
}
