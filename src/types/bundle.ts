import type { BatchHeader, InclusionProof } from "./merkle.js";
import type { Receipt } from "./receipt.js";
import type { TrustedKey } from "./trust.js";

export const PROOF_BUNDLE_FORMAT = "proofgate.proof-bundle/1";

/** Everything a third party needs to verify one receipt offline. */
export type ProofBundle = {
  format: typeof PROOF_BUNDLE_FORMAT;
  exported_at: string;
  receipt: Receipt;
  inclusion_proof: InclusionProof;
  batch: BatchHeader;
  trusted_keys: TrustedKey[];
};
