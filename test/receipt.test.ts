import { describe, expect, it } from "vitest";
import { UnknownEntityError } from "../src/errors.js";
import { encodeReceipt, receiptBody, receiptDigest } from "../src/receipt/canonical.js";
import { ReceiptGenerator, type SealInput, verifyReceipt } from "../src/receipt/generator.js";
import type { TrustLayer } from "../src/trust/layer.js";
import type { Receipt } from "../src/types/receipt.js";
import { ManualClock, digestOf, trustWithSigners } from "./helpers.js";

const INPUT: SealInput = {
  lifecycle_id: "lc-1",
  operation_id: "op-1",
  stage: "training",
  anchor_id: digestOf("anchor"),
  evidence_digest: digestOf("evidence"),
  policy: { policy_id: "test-policy", version: "1.0.0", digest: digestOf("policy") },
  timestamp: { wall: "2026-03-01T00:00:00.000Z", mono: "1000" },
  verdicts: [{ gate: "accuracy", status: "PASS", evidence_digest: digestOf("verdict") }],
  aggregate_status: "PASS",
  enforcement_action: "allow",
  outcome: "proceeded",
  signer: { role: "platform_operator" },
};

async function sealed(): Promise<{ trust: TrustLayer; receipt: Receipt }> {
  const trust = await trustWithSigners(new ManualClock());
  const receipt = await new ReceiptGenerator(trust, () => "rcpt_fixed").seal(INPUT);
  return { trust, receipt };
}

const TAMPERS: [string, (r: Receipt) => void][] = [
  ["receipt_id", (r) => (r.receipt_id = "rcpt_other")],
  ["kind", (r) => (r.kind = "review")],
  ["lifecycle_id", (r) => (r.lifecycle_id = "lc-2")],
  ["operation_id", (r) => (r.operation_id = "op-2")],
  ["stage", (r) => (r.stage = "model")],
  ["anchor_id", (r) => (r.anchor_id = digestOf("other anchor"))],
  ["evidence_digest", (r) => (r.evidence_digest = digestOf("other evidence"))],
  ["policy id", (r) => (r.policy.policy_id = "other-policy")],
  ["policy version", (r) => (r.policy.version = "1.0.1")],
  ["policy digest", (r) => (r.policy.digest = digestOf("other policy"))],
  ["timestamp wall", (r) => (r.timestamp.wall = "2026-03-01T00:00:00.001Z")],
  ["timestamp mono", (r) => (r.timestamp.mono = "1001")],
  ["verdict gate", (r) => (r.verdicts[0].gate = "precision")],
  ["verdict status", (r) => (r.verdicts[0].status = "FAIL")],
  ["verdict evidence_digest", (r) => (r.verdicts[0].evidence_digest = null)],
  ["aggregate_status", (r) => (r.aggregate_status = "WARN")],
  ["enforcement_action", (r) => (r.enforcement_action = "warn")],
  ["outcome", (r) => (r.outcome = "blocked")],
  ["warnings", (r) => r.warnings.push({ gate: "accuracy", status: "WARN", message: "added" })],
  [
    "review",
    (r) => (r.review = { request_id: "rvw_1", reviewer_id: "reviewer-1", decision: "approve", rationale: "added" }),
  ],
  ["review_receipt_id", (r) => (r.review_receipt_id = "rcpt_review")],
  ["signer", (r) => (r.signer.entity_id = "auditor-1")],
  ["signer role", (r) => (r.signer.role = "auditor")],
];

describe("receipts", () => {
  it("seals with defaults and the resolved signer", async () => {
    const { receipt } = await sealed();

    expect(receipt.receipt_id).toBe("rcpt_fixed");
    expect(receipt.kind).toBe("gate");
    expect(receipt.warnings).toEqual([]);
    expect(receipt.review).toBeNull();
    expect(receipt.review_receipt_id).toBeNull();
    expect(receipt.signer).toEqual({ entity_id: "operator-1", role: "platform_operator" });
    expect(receipt.signature.entity_id).toBe("operator-1");
    expect(receipt.digest).toBe(receiptDigest(receiptBody(receipt)));
  });

  it("encodes fields at fixed positions", async () => {
    const { receipt } = await sealed();
    const encoded: unknown = JSON.parse(encodeReceipt(receiptBody(receipt)));

    expect(Array.isArray(encoded) && encoded.slice(0, 6)).toEqual([
      "proofgate.receipt/1",
      "rcpt_fixed",
      "gate",
      "lc-1",
      "op-1",
      "training",
    ]);
    expect(Array.isArray(encoded) && encoded.slice(17)).toEqual([
      [["accuracy", "PASS", digestOf("verdict")]],
      [],
      null,
      "operator-1",
      "platform_operator",
    ]);
  });

  it("verifies untouched", async () => {
    const { trust, receipt } = await sealed();
    expect(verifyReceipt(receipt, (d, s) => trust.verify(d, s))).toBe(true);
  });

  it.each(TAMPERS)("fails verification when %s changes", async (_field, tamper) => {
    const { trust, receipt } = await sealed();
    const copy = structuredClone(receipt);
    tamper(copy);
    expect(verifyReceipt(copy, (d, s) => trust.verify(d, s))).toBe(false);
  });

  it("fails verification when the signature is from another entity", async () => {
    const { trust, receipt } = await sealed();
    const foreign = await trust.signAs("auditor-1", receipt.digest);
    expect(verifyReceipt({ ...receipt, signature: foreign }, (d, s) => trust.verify(d, s))).toBe(false);
  });

  it("refuses to seal for an unknown entity", async () => {
    const trust = await trustWithSigners(new ManualClock());
    await expect(new ReceiptGenerator(trust).seal({ ...INPUT, signer: { entity_id: "ghost" } })).rejects.toBeInstanceOf(
      UnknownEntityError,
    );
  });
});
