import type { GateStatus } from "./types/gate.js";
import type { EnforcementAction, PolicyRef } from "./types/policy.js";
import type { Receipt } from "./types/receipt.js";
import type { Stage } from "./types/stage.js";

export type ErrorCode =
  | "INVALID_PARENT"
  | "SIGNING_UNAVAILABLE"
  | "REVOKED_ENTITY"
  | "UNKNOWN_ENTITY"
  | "DUPLICATE_ENTITY"
  | "DUPLICATE_GATE"
  | "KEY_CONFLICT"
  | "POLICY_VIOLATION"
  | "POLICY_INVALID"
  | "CONTEXT_INVALID"
  | "RECEIPT_NOT_FOUND"
  | "LOG_CORRUPT"
  | "PROOF_INVALID"
  | "STORAGE_UNAVAILABLE"
  | "OPERATION_ABORTED"
  | "OPERATION_HALTED";

/** Base of every error the engine raises. `retryable` marks transient faults. */
export class ProvenanceError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

/** Anchor chain misuse: wrong parent, out-of-order stage, or divergent re-derivation. */
export class InvalidParentError extends ProvenanceError {
  constructor(message: string) {
    super("INVALID_PARENT", message);
  }
}

export class SigningUnavailableError extends ProvenanceError {
  constructor(message: string, cause?: unknown) {
    super("SIGNING_UNAVAILABLE", message, { retryable: true, cause });
  }
}

export class RevokedEntityError extends ProvenanceError {
  constructor(readonly entityId: string, readonly revokedAt: string) {
    super("REVOKED_ENTITY", `Signing entity ${entityId} was revoked at ${revokedAt}`);
  }
}

export class UnknownEntityError extends ProvenanceError {
  constructor(readonly entityId: string) {
    super("UNKNOWN_ENTITY", `Unknown signing entity: ${entityId}`);
  }
}

export class PolicyValidationError extends ProvenanceError {
  constructor(message: string, readonly source?: string) {
    super("POLICY_INVALID", source ? `${message} (${source})` : message);
  }
}

export class ProofVerificationError extends ProvenanceError {
  constructor(message: string, readonly failedChecks: string[] = []) {
    super("PROOF_INVALID", message);
  }
}

export class StorageUnavailableError extends ProvenanceError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_UNAVAILABLE", message, { retryable: true, cause });
  }
}

export type ViolationDetail = {
  operationId: string;
  stage: Stage;
  gate: string | null;
  status: GateStatus;
  thresholds: Record<string, number>;
  action: EnforcementAction;
  reason: string;
  policy: PolicyRef;
  receipt: Receipt;
};

/**
 * Expected control-flow outcome of a blocked stage. The sealed receipt
 * recording the decision travels with the error.
 */
export class PolicyViolationError extends ProvenanceError {
  readonly detail: ViolationDetail;

  constructor(detail: ViolationDetail) {
    super("POLICY_VIOLATION", describeViolation(detail));
    this.detail = detail;
  }

  get receipt(): Receipt {
    return this.detail.receipt;
  }
}

function describeViolation(d: ViolationDetail): string {
  const gate = d.gate ? `gate "${d.gate}"` : "stage aggregate";
  const thresholds = Object.entries(d.thresholds)
    .map(([k, v]) => `${k}=${v}`)
    .join(", ");
  return (
    `Operation ${d.operationId} ${d.reason} at stage ${d.stage}: ${gate} returned ${d.status}` +
    (thresholds ? ` (thresholds: ${thresholds})` : "") +
    ` under policy ${d.policy.policy_id}@${d.policy.version} (sha256:${d.policy.digest.slice(0, 12)})`
  );
}

export type AbortDiagnostic = {
  operation_id: string;
  lifecycle_id: string;
  stage: string;
  state: string;
  transitions: string[];
  error_code: string;
  message: string;
  at: string;
};

/** Terminal ABORTED run. No receipt exists; the diagnostic was logged locally. */
export class OperationAbortedError extends ProvenanceError {
  constructor(readonly diagnostic: AbortDiagnostic, cause?: unknown) {
    super("OPERATION_ABORTED", `Operation ${diagnostic.operation_id} aborted at ${diagnostic.stage}: ${diagnostic.message}`, {
      cause,
    });
  }
}

/** A previously blocked operation cannot enter further stages. */
export class OperationHaltedError extends ProvenanceError {
  constructor(readonly operationId: string, readonly blockedAt: Stage) {
    super("OPERATION_HALTED", `Operation ${operationId} was halted at stage ${blockedAt}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof ProvenanceError ? err.code : "INTERNAL";
}
