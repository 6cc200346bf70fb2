import type { GateStatus, VerdictStatus, VerdictSummary } from "./gate.js";
import type { EnforcementAction, PolicyRef } from "./policy.js";
import type { Stage } from "./stage.js";
import type { Role, Signature } from "./trust.js";

export type ReceiptKind = "gate" | "review";

export type Outcome =
  | "proceeded"
  | "proceeded_with_warnings"
  | "approved"
  | "rejected"
  | "timed_out"
  | "blocked";

export type ReviewDecision = "approve" | "reject";

export type ReviewRecord = {
  request_id: string;
  reviewer_id: string;
  decision: ReviewDecision;
  rationale: string;
};

export type ReceiptWarning = {
  gate: string;
  status: VerdictStatus;
  message: string;
};

export type ReceiptTimestamp = {
  /** UTC ISO-8601, millisecond precision. */
  wall: string;
  /** Monotonic counter (nanoseconds) as a decimal string. */
  mono: string;
};

/** Every receipt field covered by the digest. */
export type ReceiptBody = {
  receipt_id: string;
  kind: ReceiptKind;
  lifecycle_id: string;
  operation_id: string;
  stage: Stage;
  anchor_id: string;
  evidence_digest: string;
  policy: PolicyRef;
  timestamp: ReceiptTimestamp;
  verdicts: VerdictSummary[];
  aggregate_status: GateStatus;
  enforcement_action: EnforcementAction;
  outcome: Outcome;
  warnings: ReceiptWarning[];
  review: ReviewRecord | null;
  review_receipt_id: string | null;
  signer: { entity_id: string; role: Role };
};

export type Receipt = ReceiptBody & {
  digest: string;
  signature: Signature;
};
