import { describe, expect, it } from "vitest";
import { deriveAnchor, rootAnchor } from "../src/anchor/chain.js";
import { batchRootDigest } from "../src/merkle/batcher.js";
import { EMPTY_NODE, leafHash, merkleRoot } from "../src/merkle/tree.js";
import { encodeReceipt, receiptDigest } from "../src/receipt/canonical.js";
import { signatureMessage } from "../src/trust/signature.js";
import type { ReceiptBody } from "../src/types/receipt.js";
import { ROOT_SECRET } from "./helpers.js";

// Fixed inputs with their expected encodings and digests. A change to any of
// these values breaks verification of receipts already issued.

const BODY: ReceiptBody = {
  receipt_id: "rcpt_vector",
  kind: "gate",
  lifecycle_id: "lc-vector",
  operation_id: "op-vector",
  stage: "training",
  anchor_id: "aa".repeat(32),
  evidence_digest: "bb".repeat(32),
  policy: { policy_id: "vector-policy", version: "2.1.0", digest: "cc".repeat(32) },
  timestamp: { wall: "2026-03-01T12:00:00.000Z", mono: "123456789" },
  verdicts: [
    { gate: "accuracy", status: "PASS", evidence_digest: "dd".repeat(32) },
    { gate: "fairness", status: "REVIEW", evidence_digest: null },
  ],
  aggregate_status: "REVIEW",
  enforcement_action: "escalate",
  outcome: "approved",
  warnings: [{ gate: "fairness", status: "REVIEW", message: "fairness returned REVIEW" }],
  review: { request_id: "rvw_1", reviewer_id: "reviewer-1", decision: "approve", rationale: "checked manually" },
  review_receipt_id: "rcpt_review",
  signer: { entity_id: "operator-1", role: "platform_operator" },
};

const LEAVES = [1, 2, 3, 4, 5, 6, 7, 8].map((n) => n.toString(16).padStart(2, "0").repeat(32));

const NONCE = "00112233445566778899aabbccddeeff";

describe("known-answer vectors", () => {
  it("encodes a receipt body", () => {
    expect(encodeReceipt(BODY)).toBe(
      '["proofgate.receipt/1","rcpt_vector","gate","lc-vector","op-vector","training",' +
        `"${"aa".repeat(32)}","${"bb".repeat(32)}","vector-policy","2.1.0","${"cc".repeat(32)}",` +
        '"2026-03-01T12:00:00.000Z","123456789","REVIEW","escalate","approved","rcpt_review",' +
        `[["accuracy","PASS","${"dd".repeat(32)}"],["fairness","REVIEW",null]],` +
        '[["fairness","REVIEW","fairness returned REVIEW"]],' +
        '["rvw_1","reviewer-1","approve","checked manually"],"operator-1","platform_operator"]',
    );
    expect(receiptDigest(BODY)).toBe("b71aee05459e8dc20d393744cc1f35cb37b4e553e6bb4f5082267ef09ccd5ea7");
  });

  it("hashes leaves and padding", () => {
    expect(EMPTY_NODE.toString("hex")).toBe("dbc1b4c900ffe48d575b5da5c638040125f65db0fe3e24494b76ea986457d986");
    expect(leafHash(LEAVES[0]).toString("hex")).toBe("dcffe786ded16d283c663846ad0c4ff26558fccde36ca9d30b2ea19eade9fc0e");
  });

  it.each([
    [1, "dcffe786ded16d283c663846ad0c4ff26558fccde36ca9d30b2ea19eade9fc0e"],
    [2, "3a066e0f40c6a1981ebfa60d2411625d0517ae22c2fc8c7c1784ff8a75c78565"],
    [3, "9380731788b5c26f98dd6fae25fe989bdeb6247c638b573c1bfb394030e421a2"],
    [5, "614cd210e26b30ee6bf8c9c0241ada23e184b94f1463513cb43dcfff49d00877"],
    [8, "9a577296efeb0d25599dc9f9adae21a2295e78752ba8d55f85fece7528ef1e81"],
  ])("computes the Merkle root over %i leaves", (count, root) => {
    expect(merkleRoot(LEAVES.slice(0, count))).toBe(root);
  });

  it("derives root and stage anchors", () => {
    const root = rootAnchor(ROOT_SECRET, "lc-vector", NONCE);
    expect(root.material).toBe("11a285aae5aafe5f5979413ddb276f7f9ce2b67e2f2a7b4ad124049f9e91325f");
    expect(root.anchor_id).toBe("013bb4e5589d41f9c176549e713862e7e01c632583caf0c3dbd99d393eb6d582");

    const dataset = deriveAnchor(root, "dataset", "");
    expect(dataset.material).toBe("9e60695e61ac55f45bd205db235fa0f4aeb01f62f099578f460d296423e0b593");
    expect(dataset.anchor_id).toBe("d62fa28acb647ae4a83e074d14c0f7fb42d7c8afd9aa5f39c52cd708c4acec1a");
    expect(deriveAnchor(dataset, "model", "salt-1").anchor_id).toBe(
      "0a6aa4557b64fb6c0e03ba5560d97f6ff72cbe64dc0ba295b8e43a4256ed67f1",
    );
  });

  it("digests a batch header", () => {
    const digest = batchRootDigest({
      batch_id: "batch-000001",
      root: "3a066e0f40c6a1981ebfa60d2411625d0517ae22c2fc8c7c1784ff8a75c78565",
      leaf_count: 2,
      opened_at: "2026-03-01T12:00:00.000Z",
      sealed_at: "2026-03-01T12:01:00.000Z",
    });
    expect(digest).toBe("e2562b6cf44bf4214711c85307b835644f89e5663eeeea43c9f8fee65db6d3d6");
  });

  it("builds the signed message", () => {
    const message = signatureMessage(
      { entity_id: "operator-1", role: "platform_operator", key_id: "operator-1#1", signed_at: "2026-03-01T12:00:00.000Z" },
      "ee".repeat(32),
    );
    expect(message.toString("utf8")).toBe(
      `["proofgate.signature/1","operator-1","platform_operator","operator-1#1","2026-03-01T12:00:00.000Z","${"ee".repeat(32)}"]`,
    );
  });
});
