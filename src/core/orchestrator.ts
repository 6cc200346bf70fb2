import crypto from "node:crypto";
import type { AuditTrail } from "../audit/trail.js";
import { evidenceDigest } from "../crypto/hash.js";
import {
  type AbortDiagnostic,
  OperationAbortedError,
  OperationHaltedError,
  PolicyViolationError,
  ProvenanceError,
  errorCode,
  errorMessage,
} from "../errors.js";
import type { GateRegistry } from "../gates/registry.js";
import type { DiagnosticLog } from "../logging/diagnostics.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { Decision, PolicyEngine, StagePlan } from "../policy/engine.js";
import { ReceiptGenerator, type SealInput } from "../receipt/generator.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { TrustLayer } from "../trust/layer.js";
import type { OperationContext, VerdictSummary } from "../types/gate.js";
import type { Outcome, Receipt, ReceiptWarning, ReviewRecord } from "../types/receipt.js";
import type { Role } from "../types/trust.js";
import { type Clock, isoAt, systemClock } from "./clock.js";
import { KeyedMutex } from "./concurrency.js";
import { type GateResult, runGates } from "./gate-runner.js";
import type { Lifecycle } from "./lifecycle.js";
import { type RetryPolicy, withRetry } from "./retry.js";
import { type ReviewProvider, type ReviewRequest, awaitReview } from "./review.js";
import { type RunState, RunTracker, isTerminal } from "./state-machine.js";

export type OrchestratorSettings = {
  defaultGateTimeoutMs: number;
  defaultReviewTimeoutMs: number;
  receiptRole: Role;
  retry: RetryPolicy;
};

export type OrchestratorDeps = {
  trust: TrustLayer;
  registry: GateRegistry;
  trail: AuditTrail;
  schemas: SchemaRegistry;
  diagnostics: DiagnosticLog;
  settings: OrchestratorSettings;
  review?: ReviewProvider;
  logger?: Logger;
  clock?: Clock;
  generator?: ReceiptGenerator;
};

export type StageRun = {
  state: RunState;
  transitions: RunState[];
  outcome: Outcome;
  decision: Decision;
  results: GateResult[];
  warnings: ReceiptWarning[];
  receipt: Receipt;
  review_receipt: Receipt | null;
};

type Enforcement = {
  outcome: Outcome;
  warnings: ReceiptWarning[];
  review: ReviewRecord | null;
};

const HALTING: ReadonlySet<Outcome> = new Set(["rejected", "timed_out", "blocked"]);

function summarize(results: readonly GateResult[]): VerdictSummary[] {
  return results.map((r) => ({ gate: r.gate, status: r.status, evidence_digest: r.verdict?.evidence_digest ?? null }));
}

function warningsFor(results: readonly GateResult[]): ReceiptWarning[] {
  return results
    .filter((r) => r.status !== "PASS" && r.status !== "SKIPPED")
    .map((r) => ({
      gate: r.gate,
      status: r.status,
      message: r.verdict && r.verdict.recommendations.length > 0 ? r.verdict.recommendations.join("; ") : `${r.gate} returned ${r.status}`,
    }));
}

/**
 * Drives one stage of one operation through
 * IDLE → GATES_RUNNING → AGGREGATING → ENFORCING → SEALED, or to ABORTED.
 * Sealing is the only step that writes to the audit trail.
 */
export class GateOrchestrator {
  private readonly locks = new KeyedMutex<string>();
  private readonly generator: ReceiptGenerator;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: OrchestratorDeps) {
    this.generator = deps.generator ?? new ReceiptGenerator(deps.trust);
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Run the policy's gates for `context.stage` and seal the outcome.
   * Resolves for proceeding outcomes; throws PolicyViolationError (after
   * sealing) when the stage is blocked, rejected or timed out in review, and
   * OperationAbortedError when no receipt could be sealed.
   */
  async runStage(lifecycle: Lifecycle, context: OperationContext, policy: PolicyEngine): Promise<StageRun> {
    const haltedAt = lifecycle.haltedAt(context.operation_id);
    if (haltedAt) throw new OperationHaltedError(context.operation_id, haltedAt);

    const run = new RunTracker();
    const log = this.logger.child({
      lifecycle_id: lifecycle.id,
      operation_id: context.operation_id,
      stage: context.stage,
    });

    try {
      this.validateContext(lifecycle, context);
      run.apply("start");
      log.debug("STAGE_STARTED", `Running gates for ${context.stage}`, { policy: `${policy.ref.policy_id}@${policy.ref.version}` });

      const plan = policy.plan(context.stage, this.deps.registry);
      const gates = await runGates(plan, context, policy.ref, {
        defaultTimeoutMs: this.deps.settings.defaultGateTimeoutMs,
        logger: log,
        now: () => this.clock.now(),
      });
      if (gates.failedFast) {
        run.apply("fail_fast");
      } else {
        run.apply("gates_done");
      }

      const decision = policy.decide(context.stage, gates.results);
      if (run.state === "AGGREGATING") run.apply("aggregated");
      log.info("STAGE_DECIDED", `Aggregate ${decision.aggregate_status} → ${decision.action}`, {
        aggregate_status: decision.aggregate_status,
        action: decision.action,
        failed_fast: gates.failedFast,
      });

      const enforcement = await this.enforce(lifecycle, context, policy, plan, decision, gates.results, log);
      const { receipt, reviewReceipt } = await this.seal(lifecycle, context, policy, plan, decision, gates.results, enforcement);
      run.apply("sealed");
      log.info("STAGE_SEALED", `Outcome ${enforcement.outcome}`, { receipt_id: receipt.receipt_id, outcome: enforcement.outcome });

      if (HALTING.has(enforcement.outcome)) {
        lifecycle.halt(context.operation_id, context.stage);
        throw this.violation(context, policy, plan, decision, enforcement, receipt);
      }

      return {
        state: run.state,
        transitions: run.transitions,
        outcome: enforcement.outcome,
        decision,
        results: gates.results,
        warnings: enforcement.warnings,
        receipt,
        review_receipt: reviewReceipt,
      };
    } catch (err) {
      if (err instanceof PolicyViolationError) throw err;
      throw await this.abort(run, lifecycle, context, err);
    }
  }

  private validateContext(lifecycle: Lifecycle, context: OperationContext): void {
    const checked = this.deps.schemas.check<OperationContext>("operation-context", context);
    if (!checked.valid) {
      throw new ProvenanceError("CONTEXT_INVALID", `Malformed operation context: ${checked.errors}`);
    }
    if (context.lifecycle_id !== lifecycle.id) {
      throw new ProvenanceError(
        "CONTEXT_INVALID",
        `Context belongs to lifecycle ${context.lifecycle_id}, not ${lifecycle.id}`,
      );
    }
  }

  private async enforce(
    lifecycle: Lifecycle,
    context: OperationContext,
    policy: PolicyEngine,
    plan: StagePlan,
    decision: Decision,
    results: GateResult[],
    log: Logger,
  ): Promise<Enforcement> {
    switch (decision.action) {
      case "allow":
        return { outcome: "proceeded", warnings: [], review: null };
      case "warn":
        return { outcome: "proceeded_with_warnings", warnings: warningsFor(results), review: null };
      case "block":
        return { outcome: "blocked", warnings: [], review: null };
      case "escalate":
        return this.escalate(lifecycle, context, policy, plan, decision, results, log);
    }
  }

  /** Suspend for a human decision; anything but an explicit approval blocks. */
  private async escalate(
    lifecycle: Lifecycle,
    context: OperationContext,
    policy: PolicyEngine,
    plan: StagePlan,
    decision: Decision,
    results: GateResult[],
    log: Logger,
  ): Promise<Enforcement> {
    const warnings = warningsFor(results);
    const provider = this.deps.review;
    if (!provider) {
      log.warn("REVIEW_UNAVAILABLE", `No review provider; ${context.operation_id} treated as timed out`);
      return { outcome: "timed_out", warnings, review: null };
    }

    const timeoutMs = plan.reviewTimeoutMs ?? this.deps.settings.defaultReviewTimeoutMs;
    const now = this.clock.now();
    const request: ReviewRequest = {
      request_id: `rvw_${crypto.randomUUID()}`,
      lifecycle_id: lifecycle.id,
      operation_id: context.operation_id,
      stage: context.stage,
      aggregate_status: decision.aggregate_status,
      verdicts: summarize(results),
      recommendations: results.flatMap((r) => r.verdict?.recommendations ?? []),
      policy: { ...policy.ref },
      requested_at: isoAt(now),
      deadline: isoAt(now + timeoutMs),
    };
    log.info("REVIEW_REQUESTED", `Awaiting review for ${context.operation_id}`, {
      request_id: request.request_id,
      deadline: request.deadline,
    });

    const result = await awaitReview(provider, request, timeoutMs);
    if (result.kind === "timeout") {
      log.warn("REVIEW_TIMED_OUT", `Review ${request.request_id} expired; blocking`, { request_id: request.request_id });
      return { outcome: "timed_out", warnings, review: null };
    }

    const review: ReviewRecord = {
      request_id: request.request_id,
      reviewer_id: result.response.reviewer_id,
      decision: result.response.decision,
      rationale: result.response.rationale,
    };
    return { outcome: review.decision === "approve" ? "approved" : "rejected", warnings, review };
  }

  /**
   * Anchor, timestamp, sign and append under the lifecycle lock so anchors and
   * timestamps of one lifecycle follow stage order.
   */
  private async seal(
    lifecycle: Lifecycle,
    context: OperationContext,
    policy: PolicyEngine,
    plan: StagePlan,
    decision: Decision,
    results: GateResult[],
    enforcement: Enforcement,
  ): Promise<{ receipt: Receipt; reviewReceipt: Receipt | null }> {
    return this.locks.run(lifecycle.id, async () => {
      const anchor = lifecycle.chain.next(context.stage, context.anchor_salt ?? "");
      const common = {
        lifecycle_id: lifecycle.id,
        operation_id: context.operation_id,
        stage: context.stage,
        anchor_id: anchor.anchor_id,
        evidence_digest: evidenceDigest(context.evidence),
        policy: { ...policy.ref },
        verdicts: summarize(results),
        aggregate_status: decision.aggregate_status,
        enforcement_action: decision.action,
      };

      let reviewReceipt: Receipt | null = null;
      if (enforcement.review) {
        reviewReceipt = await this.sealWithRetry({
          ...common,
          kind: "review",
          timestamp: lifecycle.stamper.stamp(),
          outcome: enforcement.outcome,
          review: enforcement.review,
          signer: { entity_id: enforcement.review.reviewer_id },
        });
      }

      const receipt = await this.sealWithRetry({
        ...common,
        kind: "gate",
        timestamp: lifecycle.stamper.stamp(),
        outcome: enforcement.outcome,
        warnings: enforcement.warnings,
        review: enforcement.review,
        review_receipt_id: reviewReceipt?.receipt_id ?? null,
        signer: { role: plan.signerRole ?? this.deps.settings.receiptRole },
      });

      await this.deps.trail.appendAll(reviewReceipt ? [reviewReceipt, receipt] : [receipt]);
      return { receipt, reviewReceipt };
    });
  }

  private sealWithRetry(input: SealInput): Promise<Receipt> {
    return withRetry(() => this.generator.seal(input), {
      ...this.deps.settings.retry,
      onRetry: (err, attempt, delayMs) =>
        this.logger.warn("SEAL_RETRY", `Sealing failed (attempt ${attempt}): ${errorMessage(err)}`, {
          operation_id: input.operation_id,
          stage: input.stage,
          delay_ms: delayMs,
        }),
    });
  }

  private violation(
    context: OperationContext,
    policy: PolicyEngine,
    plan: StagePlan,
    decision: Decision,
    enforcement: Enforcement,
    receipt: Receipt,
  ): PolicyViolationError {
    const status = decision.aggregate_status;
    const gate =
      decision.triggered_by.find((g) => policy.enforcementFor(context.stage, g)[status] === decision.action) ??
      decision.triggered_by[0] ??
      null;
    const planned = plan.gates.find((g) => g.name === gate);

    let reason: string;
    if (enforcement.outcome === "rejected") {
      reason = `was rejected in review by ${enforcement.review?.reviewer_id ?? "a reviewer"}`;
    } else if (enforcement.outcome === "timed_out") {
      reason = "timed out awaiting review";
    } else {
      reason = "was blocked";
    }

    return new PolicyViolationError({
      operationId: context.operation_id,
      stage: context.stage,
      gate,
      status,
      thresholds: planned ? { ...planned.thresholds } : {},
      action: decision.action,
      reason,
      policy: { ...policy.ref },
      receipt,
    });
  }

  /** Record the unsealed diagnostic and build the error surfaced to the caller. */
  private async abort(run: RunTracker, lifecycle: Lifecycle, context: OperationContext, err: unknown): Promise<OperationAbortedError> {
    const failedIn = run.state;
    if (!isTerminal(failedIn)) run.apply("error");

    const diagnostic: AbortDiagnostic = {
      operation_id: typeof context.operation_id === "string" ? context.operation_id : "unknown",
      lifecycle_id: lifecycle.id,
      stage: typeof context.stage === "string" ? context.stage : "unknown",
      state: failedIn,
      transitions: run.transitions,
      error_code: errorCode(err),
      message: errorMessage(err),
      at: isoAt(this.clock.now()),
    };
    await this.deps.diagnostics.record(diagnostic);
    return new OperationAbortedError(diagnostic, err);
  }
}
