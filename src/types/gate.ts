import type { JsonObject, JsonValue } from "./json.js";
import type { PolicyRef } from "./policy.js";
import type { Stage } from "./stage.js";

export const GATE_STATUSES = ["PASS", "WARN", "FAIL", "REVIEW"] as const;

export type GateStatus = (typeof GATE_STATUSES)[number];

/** Status as recorded in a receipt; SKIPPED marks gates cut short by fail-fast. */
export type VerdictStatus = GateStatus | "SKIPPED";

export function isGateStatus(value: unknown): value is GateStatus {
  return GATE_STATUSES.some((s) => s === value);
}

/** Reference to evidence owned by an external collaborator. Only the digest enters the core. */
export type EvidenceRef = {
  name: string;
  digest: string;
  uri?: string;
};

/** Input handed to the orchestrator for one stage of one operation. */
export type OperationContext = {
  lifecycle_id: string;
  operation_id: string;
  stage: Stage;
  metadata: JsonObject;
  evidence: EvidenceRef[];
  anchor_salt?: string;
};

/** Read-only view a gate evaluates. Deep-frozen before dispatch. */
export type GateContext = Readonly<{
  lifecycle_id: string;
  operation_id: string;
  stage: Stage;
  metadata: Readonly<JsonObject>;
  evidence: readonly Readonly<EvidenceRef>[];
  thresholds: Readonly<Record<string, number>>;
  parameters: Readonly<JsonObject>;
  policy: Readonly<PolicyRef>;
}>;

export type GateVerdict = {
  gate: string;
  stage: Stage;
  status: GateStatus;
  metrics: Record<string, JsonValue>;
  recommendations: string[];
  evidence_digest: string;
};

/**
 * Pluggable evaluator. `evaluate` must be a pure function of its context so
 * verdicts are reproducible under the same policy.
 */
export interface Gate {
  readonly name: string;
  readonly version?: string;
  evaluate(context: GateContext): GateVerdict | Promise<GateVerdict>;
}

/** Compact per-gate entry carried in receipts. */
export type VerdictSummary = {
  gate: string;
  status: VerdictStatus;
  evidence_digest: string | null;
};
