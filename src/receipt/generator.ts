import crypto from "node:crypto";
import { UnknownEntityError } from "../errors.js";
import type { GateStatus, VerdictSummary } from "../types/gate.js";
import type { EnforcementAction, PolicyRef } from "../types/policy.js";
import type {
  Outcome,
  Receipt,
  ReceiptKind,
  ReceiptTimestamp,
  ReceiptWarning,
  ReviewRecord,
} from "../types/receipt.js";
import type { Stage } from "../types/stage.js";
import type { Role, Signature, SigningEntity } from "../types/trust.js";
import type { TrustLayer } from "../trust/layer.js";
import { receiptBody, receiptDigest } from "./canonical.js";

export type SealInput = {
  kind?: ReceiptKind;
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
  warnings?: ReceiptWarning[];
  review?: ReviewRecord | null;
  review_receipt_id?: string | null;
  /** Signer chosen by role, or a specific entity (reviewers sign their own decisions). */
  signer: { role: Role } | { entity_id: string };
};

export class ReceiptGenerator {
  constructor(
    private readonly trust: TrustLayer,
    private readonly newId: () => string = () => `rcpt_${crypto.randomUUID()}`,
  ) {}

  /**
   * Digest the canonical encoding and have the trust layer sign it.
   * Throws SigningUnavailableError when no authorized signer can sign.
   */
  async seal(input: SealInput): Promise<Receipt> {
    const signer = this.signerFor(input.signer);
    const body = {
      receipt_id: this.newId(),
      kind: input.kind ?? "gate",
      lifecycle_id: input.lifecycle_id,
      operation_id: input.operation_id,
      stage: input.stage,
      anchor_id: input.anchor_id,
      evidence_digest: input.evidence_digest,
      policy: { ...input.policy },
      timestamp: { ...input.timestamp },
      verdicts: input.verdicts.map((v) => ({ ...v })),
      aggregate_status: input.aggregate_status,
      enforcement_action: input.enforcement_action,
      outcome: input.outcome,
      warnings: (input.warnings ?? []).map((w) => ({ ...w })),
      review: input.review ? { ...input.review } : null,
      review_receipt_id: input.review_receipt_id ?? null,
      signer: { entity_id: signer.entity_id, role: signer.role },
    };
    const digest = receiptDigest(body);
    const signature = await this.trust.signAs(signer.entity_id, digest);
    return { ...body, digest, signature };
  }

  private signerFor(signer: SealInput["signer"]): SigningEntity {
    if ("entity_id" in signer) {
      const entity = this.trust.entity(signer.entity_id);
      if (!entity) throw new UnknownEntityError(signer.entity_id);
      return entity;
    }
    return this.trust.resolveSigner(signer.role);
  }
}

/**
 * True when the digest matches the receipt's fields and the signature was
 * made by the signer the receipt names.
 */
export function verifyReceipt(receipt: Receipt, verify: (digest: string, signature: Signature) => boolean): boolean {
  if (receiptDigest(receiptBody(receipt)) !== receipt.digest) return false;
  if (receipt.signature.entity_id !== receipt.signer.entity_id || receipt.signature.role !== receipt.signer.role) {
    return false;
  }
  return verify(receipt.digest, receipt.signature);
}
