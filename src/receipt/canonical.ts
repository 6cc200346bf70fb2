import { sha256Hex } from "../crypto/hash.js";
import type { Receipt, ReceiptBody } from "../types/receipt.js";

export const RECEIPT_FORMAT = "proofgate.receipt/1";

/**
 * Canonical receipt encoding: a JSON array with every field at a fixed
 * position. Only strings, null and nested arrays occur, so the bytes do not
 * depend on key ordering or number formatting.
 *
 *   0  format tag            12 timestamp.mono
 *   1  receipt_id            13 aggregate_status
 *   2  kind                  14 enforcement_action
 *   3  lifecycle_id          15 outcome
 *   4  operation_id          16 review_receipt_id | null
 *   5  stage                 17 verdicts  [[gate, status, evidence_digest | null]]
 *   6  anchor_id             18 warnings  [[gate, status, message]]
 *   7  evidence_digest       19 review    [request_id, reviewer_id, decision, rationale] | null
 *   8  policy.policy_id      20 signer.entity_id
 *   9  policy.version        21 signer.role
 *  10  policy.digest
 *  11  timestamp.wall
 */
export function encodeReceipt(body: ReceiptBody): string {
  return JSON.stringify([
    RECEIPT_FORMAT,
    body.receipt_id,
    body.kind,
    body.lifecycle_id,
    body.operation_id,
    body.stage,
    body.anchor_id,
    body.evidence_digest,
    body.policy.policy_id,
    body.policy.version,
    body.policy.digest,
    body.timestamp.wall,
    body.timestamp.mono,
    body.aggregate_status,
    body.enforcement_action,
    body.outcome,
    body.review_receipt_id,
    body.verdicts.map((v) => [v.gate, v.status, v.evidence_digest]),
    body.warnings.map((w) => [w.gate, w.status, w.message]),
    body.review ? [body.review.request_id, body.review.reviewer_id, body.review.decision, body.review.rationale] : null,
    body.signer.entity_id,
    body.signer.role,
  ]);
}

export function receiptDigest(body: ReceiptBody): string {
  return sha256Hex(encodeReceipt(body));
}

export function receiptBody(receipt: Receipt): ReceiptBody {
  const { digest: _digest, signature: _signature, ...body } = receipt;
  return body;
}
