import { ProofVerificationError } from "../errors.js";
import { batchRootDigest } from "../merkle/batcher.js";
import { verifyInclusion } from "../merkle/tree.js";
import { receiptBody, receiptDigest } from "../receipt/canonical.js";
import { verifyReceipt } from "../receipt/generator.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { verifyWithKeys } from "../trust/signature.js";
import { PROOF_BUNDLE_FORMAT, type ProofBundle } from "../types/bundle.js";
import type { TrustedKey } from "../types/trust.js";

export type BundleCheckName =
  | "format"
  | "receipt_digest"
  | "receipt_signature"
  | "inclusion"
  | "batch_root_digest"
  | "batch_threshold";

export type BundleCheck = { name: BundleCheckName; ok: boolean; detail?: string };

export type BundleReport = { valid: boolean; checks: BundleCheck[] };

export type VerifyBundleOptions = {
  /**
   * Keys the verifier trusts. Without them the bundle's own keys are used,
   * which proves internal consistency but not who signed.
   */
  trustedKeys?: readonly TrustedKey[];
  /** Smallest acceptable number of root signatures; the bundle's own threshold applies when higher. */
  minThreshold?: number;
};

/**
 * Verify a proof bundle with no access to the live system: receipt digest and
 * signature, Merkle inclusion under the batch root, the signed batch header and
 * its signature threshold.
 */
export function verifyProofBundle(bundle: ProofBundle, opts: VerifyBundleOptions = {}): BundleReport {
  const keys = opts.trustedKeys ?? bundle.trusted_keys;
  const { receipt, inclusion_proof: proof, batch } = bundle;
  const checks: BundleCheck[] = [];

  checks.push({ name: "format", ok: bundle.format === PROOF_BUNDLE_FORMAT });

  const digestOk = receiptDigest(receiptBody(receipt)) === receipt.digest;
  checks.push({ name: "receipt_digest", ok: digestOk, detail: digestOk ? undefined : "fields do not hash to the digest" });

  checks.push({ name: "receipt_signature", ok: verifyReceipt(receipt, (d, s) => verifyWithKeys(d, s, keys)) });

  const linked =
    proof.receipt_digest === receipt.digest &&
    proof.batch_id === batch.batch_id &&
    proof.root === batch.root &&
    proof.leaf_count === batch.leaf_count;
  checks.push({
    name: "inclusion",
    ok: linked && verifyInclusion(proof, batch.root),
    detail: linked ? undefined : "proof does not refer to this receipt and batch",
  });

  checks.push({ name: "batch_root_digest", ok: batchRootDigest(batch) === batch.root_digest });

  const required = Math.max(1, batch.threshold, opts.minThreshold ?? 0);
  const signers = new Set(
    batch.signatures.filter((s) => verifyWithKeys(batch.root_digest, s, keys)).map((s) => s.entity_id),
  );
  checks.push({
    name: "batch_threshold",
    ok: signers.size >= required,
    detail: `${signers.size} valid root signature(s), ${required} required`,
  });

  return { valid: checks.every((c) => c.ok), checks };
}

/** Like verifyProofBundle, but throws ProofVerificationError naming the failed checks. */
export function assertProofBundle(bundle: ProofBundle, opts: VerifyBundleOptions = {}): void {
  const report = verifyProofBundle(bundle, opts);
  if (!report.valid) {
    const failed = report.checks.filter((c) => !c.ok).map((c) => c.name);
    throw new ProofVerificationError(`Proof bundle failed: ${failed.join(", ")}`, failed);
  }
}

/** Shape-check an untrusted bundle (for example one read from disk) before verifying it. */
export function parseProofBundle(raw: unknown, schemas: SchemaRegistry): ProofBundle {
  const checked = schemas.check<ProofBundle>("proof-bundle", raw);
  if (!checked.valid) {
    throw new ProofVerificationError(`Malformed proof bundle: ${checked.errors}`, ["format"]);
  }
  return checked.value;
}

export function parseTrustedKeys(raw: unknown, schemas: SchemaRegistry): TrustedKey[] {
  const checked = schemas.check<TrustedKey[]>("trusted-keys", raw);
  if (!checked.valid) {
    throw new ProofVerificationError(`Malformed trusted keys: ${checked.errors}`, ["receipt_signature"]);
  }
  return checked.value;
}
