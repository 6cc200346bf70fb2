import { canonicalJson, sha256Hex } from "../crypto/hash.js";
import type { GateRegistry } from "../gates/registry.js";
import type { Gate, GateStatus, VerdictStatus } from "../types/gate.js";
import type { JsonObject } from "../types/json.js";
import type {
  EnforcementAction,
  EnforcementMap,
  GatePolicyEntry,
  PolicyDocument,
  PolicyRef,
  StagePolicy,
} from "../types/policy.js";
import type { Stage } from "../types/stage.js";
import type { Role } from "../types/trust.js";

export const DEFAULT_ENFORCEMENT: Readonly<EnforcementMap> = Object.freeze({
  PASS: "allow",
  WARN: "warn",
  REVIEW: "escalate",
  FAIL: "block",
});

const STATUS_RANK: Record<GateStatus, number> = { PASS: 0, WARN: 1, REVIEW: 2, FAIL: 3 };
const ACTION_RANK: Record<EnforcementAction, number> = { allow: 0, warn: 1, escalate: 2, block: 3 };

export type PlannedGate = {
  name: string;
  /** Null when the policy enables a gate nobody registered for this stage. */
  gate: Gate | null;
  thresholds: Record<string, number>;
  parameters: JsonObject;
  enforcement: EnforcementMap;
  timeoutMs: number | undefined;
};

export type StagePlan = {
  stage: Stage;
  failFast: boolean;
  parallel: boolean;
  gateTimeoutMs: number | undefined;
  reviewTimeoutMs: number | undefined;
  signerRole: Role | undefined;
  gates: PlannedGate[];
};

export type Decision = {
  aggregate_status: GateStatus;
  action: EnforcementAction;
  /** Gates whose status equals the aggregate, in result order. */
  triggered_by: string[];
};

/** Worst status ranked FAIL > REVIEW > WARN > PASS. SKIPPED does not count; nothing evaluated is PASS. */
export function aggregateStatus(statuses: Iterable<VerdictStatus>): GateStatus {
  let worst: GateStatus = "PASS";
  for (const s of statuses) {
    if (s !== "SKIPPED" && STATUS_RANK[s] > STATUS_RANK[worst]) worst = s;
  }
  return worst;
}

export function mostSevere(actions: Iterable<EnforcementAction>): EnforcementAction {
  let worst: EnforcementAction = "allow";
  for (const a of actions) {
    if (ACTION_RANK[a] > ACTION_RANK[worst]) worst = a;
  }
  return worst;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Immutable view over one policy version. All decisions are pure functions of
 * the document and the verdicts handed in.
 */
export class PolicyEngine {
  readonly document: PolicyDocument;
  readonly ref: PolicyRef;

  private constructor(document: PolicyDocument) {
    this.document = deepFreeze(structuredClone(document));
    this.ref = Object.freeze({
      policy_id: document.policy_id,
      version: document.version,
      digest: policyDigest(document),
    });
  }

  static fromDocument(document: PolicyDocument): PolicyEngine {
    return new PolicyEngine(document);
  }

  stagePolicy(stage: Stage): StagePolicy | undefined {
    return this.document.stages[stage];
  }

  /** Enforcement map for a gate: defaults ← policy defaults ← stage ← gate entry. */
  enforcementFor(stage: Stage, gateName?: string): EnforcementMap {
    const stagePolicy = this.stagePolicy(stage);
    const entry = gateName === undefined ? undefined : stagePolicy?.gates.find((g) => g.name === gateName);
    return {
      ...DEFAULT_ENFORCEMENT,
      ...this.document.defaults?.enforcement,
      ...stagePolicy?.enforcement,
      ...entry?.enforcement,
    };
  }

  /**
   * Enabled gate entries for `stage` in policy order, resolved against the
   * registry. Registered gates the policy does not name are not planned.
   */
  plan(stage: Stage, registry: GateRegistry): StagePlan {
    const stagePolicy = this.stagePolicy(stage);
    const defaults = this.document.defaults;
    const entries: GatePolicyEntry[] = stagePolicy?.gates.filter((g) => g.enabled) ?? [];

    return {
      stage,
      failFast: stagePolicy?.fail_fast ?? defaults?.fail_fast ?? false,
      parallel: stagePolicy?.parallel ?? defaults?.parallel ?? true,
      gateTimeoutMs: stagePolicy?.gate_timeout_ms ?? defaults?.gate_timeout_ms,
      reviewTimeoutMs: stagePolicy?.review_timeout_ms ?? defaults?.review_timeout_ms,
      signerRole: stagePolicy?.signer_role ?? defaults?.signer_role,
      gates: entries.map((entry) => ({
        name: entry.name,
        gate: registry.resolve(entry.name, stage) ?? null,
        thresholds: { ...entry.thresholds },
        parameters: structuredClone(entry.parameters ?? {}),
        enforcement: this.enforcementFor(stage, entry.name),
        timeoutMs: entry.timeout_ms,
      })),
    };
  }

  /**
   * Aggregate the results and pick the most severe action configured, for the
   * aggregate status, on the gates that produced it.
   */
  decide(stage: Stage, results: readonly { gate: string; status: VerdictStatus }[]): Decision {
    const aggregate = aggregateStatus(results.map((r) => r.status));
    const triggered = results.filter((r) => r.status === aggregate).map((r) => r.gate);
    const action =
      triggered.length === 0
        ? this.enforcementFor(stage)[aggregate]
        : mostSevere(triggered.map((g) => this.enforcementFor(stage, g)[aggregate]));
    return { aggregate_status: aggregate, action, triggered_by: triggered };
  }
}

export function policyDigest(document: PolicyDocument): string {
  return sha256Hex(canonicalJson(document));
}
