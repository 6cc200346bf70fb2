import { isHexDigest, sha256 } from "../crypto/hash.js";
import type { InclusionProof, ProofStep } from "../types/merkle.js";

const LEAF_PREFIX = Buffer.from([0x00]);
const NODE_PREFIX = Buffer.from([0x01]);

/** Padding node for odd levels; domain-separated from leaves and inner nodes. */
export const EMPTY_NODE = sha256(Buffer.from([0x02]));

export function leafHash(digest: string): Buffer {
  return sha256(Buffer.concat([LEAF_PREFIX, Buffer.from(digest, "hex")]));
}

/** Inner node over `left || right`; the order is never swapped. */
export function nodeHash(left: Buffer, right: Buffer): Buffer {
  return sha256(Buffer.concat([NODE_PREFIX, left, right]));
}

/** Number of hashing levels above the leaves for `count` leaves. */
export function treeDepth(count: number): number {
  let depth = 0;
  for (let n = count; n > 1; n = Math.ceil(n / 2)) depth++;
  return depth;
}

function buildLevels(digests: readonly string[]): Buffer[][] {
  if (digests.length === 0) throw new RangeError("Cannot build a Merkle tree without leaves");
  for (const d of digests) {
    if (!isHexDigest(d)) throw new TypeError(`Not a sha256 hex digest: ${d}`);
  }
  const levels: Buffer[][] = [digests.map(leafHash)];
  for (let level = levels[0]; level.length > 1; level = levels[levels.length - 1]) {
    const next: Buffer[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(nodeHash(level[i], level[i + 1] ?? EMPTY_NODE));
    }
    levels.push(next);
  }
  return levels;
}

/** Root over the ordered digests. Reordering leaves changes the root. */
export function merkleRoot(digests: readonly string[]): string {
  const levels = buildLevels(digests);
  return levels[levels.length - 1][0].toString("hex");
}

export function buildProof(digests: readonly string[], index: number, batchId: string): InclusionProof {
  if (!Number.isInteger(index) || index < 0 || index >= digests.length) {
    throw new RangeError(`Leaf index ${index} out of range for ${digests.length} leaves`);
  }
  const levels = buildLevels(digests);
  const path: ProofStep[] = [];
  let i = index;
  for (const level of levels.slice(0, -1)) {
    const isLeft = i % 2 === 0;
    const sibling = isLeft ? (level[i + 1] ?? EMPTY_NODE) : level[i - 1];
    path.push({ hash: sibling.toString("hex"), position: isLeft ? "right" : "left" });
    i = Math.floor(i / 2);
  }
  return {
    batch_id: batchId,
    receipt_digest: digests[index],
    leaf_index: index,
    leaf_count: digests.length,
    path,
    root: levels[levels.length - 1][0].toString("hex"),
  };
}

/**
 * Recompute the root from the leaf and its sibling path. Each step's side must
 * agree with the leaf index, the path must have exactly the tree's depth, and
 * padded positions must carry the empty node.
 */
export function verifyInclusion(proof: InclusionProof, expectedRoot: string): boolean {
  if (!isHexDigest(proof.receipt_digest) || !isHexDigest(expectedRoot)) return false;
  if (!Number.isInteger(proof.leaf_count) || proof.leaf_count < 1) return false;
  if (!Number.isInteger(proof.leaf_index) || proof.leaf_index < 0 || proof.leaf_index >= proof.leaf_count) return false;
  if (proof.path.length !== treeDepth(proof.leaf_count)) return false;

  let hash = leafHash(proof.receipt_digest);
  let index = proof.leaf_index;
  let width = proof.leaf_count;
  for (const step of proof.path) {
    if (!isHexDigest(step.hash)) return false;
    const isLeft = index % 2 === 0;
    if (step.position !== (isLeft ? "right" : "left")) return false;
    const sibling = Buffer.from(step.hash, "hex");
    if (isLeft && index + 1 >= width && !sibling.equals(EMPTY_NODE)) return false;
    hash = isLeft ? nodeHash(hash, sibling) : nodeHash(sibling, hash);
    index = Math.floor(index / 2);
    width = Math.ceil(width / 2);
  }

  const computed = hash.toString("hex");
  return computed === expectedRoot && computed === proof.root;
}
