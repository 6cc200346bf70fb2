import type { Signature } from "./trust.js";

/** Sibling hash at one level; `position` is the side the sibling sits on. */
export type ProofStep = {
  hash: string;
  position: "left" | "right";
};

export type InclusionProof = {
  batch_id: string;
  receipt_digest: string;
  leaf_index: number;
  leaf_count: number;
  path: ProofStep[];
  root: string;
};

export type SealedBatch = {
  batch_id: string;
  receipt_ids: string[];
  leaves: string[];
  leaf_count: number;
  root: string;
  root_digest: string;
  opened_at: string;
  sealed_at: string;
  threshold: number;
  signatures: Signature[];
};

/** Batch fields a third party needs to check a root signature. */
export type BatchHeader = Omit<SealedBatch, "receipt_ids" | "leaves">;
