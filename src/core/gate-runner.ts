import { canonicalJson, isHexDigest, sha256Hex } from "../crypto/hash.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { PlannedGate, StagePlan } from "../policy/engine.js";
import { type GateContext, type GateVerdict, type OperationContext, type VerdictStatus, isGateStatus } from "../types/gate.js";
import { isJsonObject } from "../types/json.js";
import type { PolicyRef } from "../types/policy.js";

export type GateResult = {
  gate: string;
  status: VerdictStatus;
  /** Null for SKIPPED gates. */
  verdict: GateVerdict | null;
  /** Set when the gate's REVIEW verdict was substituted for a failure. */
  failure?: string;
  duration_ms: number;
};

export type GateRunOutcome = {
  results: GateResult[];
  failedFast: boolean;
};

export type GateRunOptions = {
  defaultTimeoutMs: number;
  logger: Logger;
  now?: () => number;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function gateContext(ctx: OperationContext, planned: PlannedGate, policy: PolicyRef): GateContext {
  return deepFreeze({
    lifecycle_id: ctx.lifecycle_id,
    operation_id: ctx.operation_id,
    stage: ctx.stage,
    metadata: structuredClone(ctx.metadata),
    evidence: structuredClone(ctx.evidence),
    thresholds: { ...planned.thresholds },
    parameters: structuredClone(planned.parameters),
    policy: { ...policy },
  });
}

/** Describe why a gate's return value is not a usable verdict, or null if it is. */
function verdictProblem(value: unknown, planned: PlannedGate, ctx: OperationContext): string | null {
  if (!isJsonObject(value)) return "returned a non-object verdict";
  if (value.gate !== planned.name) return `returned a verdict for gate ${String(value.gate)}`;
  if (value.stage !== ctx.stage) return `returned a verdict for stage ${String(value.stage)}`;
  if (!isGateStatus(value.status)) return `returned unknown status ${String(value.status)}`;
  if (!isHexDigest(value.evidence_digest)) return "returned a verdict without a sha256 evidence digest";
  if (!isJsonObject(value.metrics) || !Array.isArray(value.recommendations)) return "returned malformed metrics or recommendations";
  return null;
}

/** REVIEW verdict standing in for a gate that failed to produce one; the failure becomes its evidence. */
function reviewVerdict(planned: PlannedGate, ctx: OperationContext, failure: string): GateVerdict {
  return {
    gate: planned.name,
    stage: ctx.stage,
    status: "REVIEW",
    metrics: { failure },
    recommendations: [`Gate ${planned.name} ${failure}; human review required`],
    evidence_digest: sha256Hex(canonicalJson({ gate: planned.name, stage: ctx.stage, operation_id: ctx.operation_id, failure })),
  };
}

async function evaluateOne(
  planned: PlannedGate,
  ctx: OperationContext,
  plan: StagePlan,
  policy: PolicyRef,
  signal: AbortSignal,
  opts: GateRunOptions,
): Promise<GateResult> {
  const now = opts.now ?? Date.now;
  const started = now();
  const failed = (failure: string): GateResult => {
    opts.logger.warn("GATE_REVIEW_SUBSTITUTED", `Gate ${planned.name} ${failure}`, {
      gate: planned.name,
      stage: ctx.stage,
      operation_id: ctx.operation_id,
    });
    return { gate: planned.name, status: "REVIEW", verdict: reviewVerdict(planned, ctx, failure), failure, duration_ms: now() - started };
  };

  const gate = planned.gate;
  if (!gate) return failed(`is not registered for stage ${ctx.stage}`);

  const timeoutMs = planned.timeoutMs ?? plan.gateTimeoutMs ?? opts.defaultTimeoutMs;
  let interrupt: (reason: "timeout" | "skipped") => void = () => undefined;
  const interrupted = new Promise<"timeout" | "skipped">((resolve) => {
    interrupt = resolve;
  });
  const timer = setTimeout(() => interrupt("timeout"), timeoutMs);
  const onAbort = (): void => interrupt("skipped");
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    const context = gateContext(ctx, planned, policy);
    const raced = await Promise.race([Promise.resolve().then(() => gate.evaluate(context)), interrupted]);
    if (raced === "skipped") {
      return { gate: planned.name, status: "SKIPPED", verdict: null, duration_ms: now() - started };
    }
    if (raced === "timeout") return failed(`timed out after ${timeoutMs}ms`);

    const problem = verdictProblem(raced, planned, ctx);
    if (problem) return failed(problem);
    return { gate: planned.name, status: raced.status, verdict: raced, duration_ms: now() - started };
  } catch (err) {
    return failed(`threw: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Evaluate the planned gates. Evaluation failures never escape: they become
 * REVIEW results. With fail-fast, the first FAIL ends the run and every gate
 * without a result is recorded as SKIPPED.
 */
export async function runGates(
  plan: StagePlan,
  ctx: OperationContext,
  policy: PolicyRef,
  opts: GateRunOptions,
): Promise<GateRunOutcome> {
  const results = new Map<string, GateResult>();
  const controller = new AbortController();
  let failedFast = false;

  const record = (r: GateResult): void => {
    if (failedFast) return;
    results.set(r.gate, r);
    if (r.status === "FAIL" && plan.failFast) {
      failedFast = true;
      controller.abort();
    }
  };

  if (plan.parallel) {
    let stopEarly: () => void = () => undefined;
    const stopped = new Promise<void>((resolve) => {
      stopEarly = resolve;
    });
    controller.signal.addEventListener("abort", () => stopEarly(), { once: true });
    const all = Promise.all(
      plan.gates.map(async (g) => record(await evaluateOne(g, ctx, plan, policy, controller.signal, opts))),
    );
    await Promise.race([all, stopped]);
  } else {
    for (const g of plan.gates) {
      if (failedFast) break;
      record(await evaluateOne(g, ctx, plan, policy, controller.signal, opts));
    }
  }

  return {
    results: plan.gates.map(
      (g) => results.get(g.name) ?? { gate: g.name, status: "SKIPPED", verdict: null, duration_ms: 0 },
    ),
    failedFast,
  };
}
