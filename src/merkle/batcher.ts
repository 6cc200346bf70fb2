import { type Clock, isoAt, systemClock } from "../core/clock.js";
import { KeyedMutex } from "../core/concurrency.js";
import type { RetryPolicy } from "../core/retry.js";
import { sha256Hex } from "../crypto/hash.js";
import { ProofVerificationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { InclusionProof, SealedBatch } from "../types/merkle.js";
import type { Role } from "../types/trust.js";
import type { TrustLayer } from "../trust/layer.js";
import { buildProof, merkleRoot } from "./tree.js";

const BATCH_DOMAIN = "proofgate.batch/1";

export type BatchWindow = {
  maxReceipts: number;
  maxAgeMs: number;
};

export type BatcherOptions = {
  window: BatchWindow;
  rootSigning: { required: number; roles: readonly Role[] };
  retry?: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
};

type OpenBatch = {
  batch_id: string;
  opened_at: number;
  receipt_ids: string[];
  leaves: string[];
};

type ClosedBatch = Omit<SealedBatch, "signatures">;

export type LeafPosition = {
  batch_id: string;
  leaf_index: number;
  state: "open" | "closed" | "sealed";
};

/** Digest the batch header that root signatures cover. */
export function batchRootDigest(b: Pick<SealedBatch, "batch_id" | "root" | "leaf_count" | "opened_at" | "sealed_at">): string {
  return sha256Hex(JSON.stringify([BATCH_DOMAIN, b.batch_id, b.root, b.leaf_count, b.opened_at, b.sealed_at]));
}

export function formatBatchId(seq: number): string {
  return `batch-${String(seq).padStart(6, "0")}`;
}

/**
 * Accumulates receipt digests in arrival order and seals them into signed
 * Merkle batches. Closing a batch is synchronous, so receipts arriving while
 * its root is being signed land in the next batch. A closed batch whose root
 * could not reach the signature threshold stays unpublished and is signed again
 * by the next `sealBatch` call.
 */
export class Batcher {
  private open: OpenBatch | null = null;
  private readonly closed: ClosedBatch[] = [];
  private readonly sealed = new Map<string, SealedBatch>();
  private readonly positions = new Map<string, LeafPosition>();
  private readonly lock = new KeyedMutex<string>();
  private readonly clock: Clock;
  private seq = 0;

  constructor(private readonly trust: TrustLayer, private readonly opts: BatcherOptions) {
    this.clock = opts.clock ?? systemClock;
  }

  /** Append a digest to the open batch. Re-adding a known digest returns its existing position. */
  add(receiptId: string, digest: string): LeafPosition {
    const known = this.positions.get(digest);
    if (known) return { ...known };

    if (!this.open) {
      this.open = { batch_id: formatBatchId(++this.seq), opened_at: this.clock.now(), receipt_ids: [], leaves: [] };
    }
    const position: LeafPosition = { batch_id: this.open.batch_id, leaf_index: this.open.leaves.length, state: "open" };
    this.open.receipt_ids.push(receiptId);
    this.open.leaves.push(digest);
    this.positions.set(digest, position);
    return { ...position };
  }

  isDue(): boolean {
    if (!this.open || this.open.leaves.length === 0) return false;
    if (this.open.leaves.length >= this.opts.window.maxReceipts) return true;
    return this.clock.now() - this.open.opened_at >= this.opts.window.maxAgeMs;
  }

  hasPending(): boolean {
    return (this.open !== null && this.open.leaves.length > 0) || this.closed.length > 0;
  }

  /**
   * Close the open batch and sign every closed batch's root at threshold.
   * Returns the last batch sealed by this call, or null when nothing was pending.
   */
  async sealBatch(): Promise<SealedBatch | null> {
    this.closeOpen();
    return this.lock.run("seal", async () => {
      let last: SealedBatch | null = null;
      while (this.closed.length > 0) {
        const batch = this.closed[0];
        const signatures = await this.trust.signThreshold(batch.root_digest, {
          required: this.opts.rootSigning.required,
          roles: this.opts.rootSigning.roles,
          retry: this.opts.retry,
        });
        this.closed.shift();
        last = Object.freeze({ ...batch, signatures });
        this.sealed.set(last.batch_id, last);
        for (const d of last.leaves) this.markSealed(d);
        this.opts.logger?.info("BATCH_SEALED", `Sealed ${last.batch_id}`, {
          batch_id: last.batch_id,
          leaf_count: last.leaf_count,
          root: last.root,
        });
      }
      return last;
    });
  }

  /** Inclusion proof for a digest in a sealed batch; null when the digest is not sealed here. */
  prove(digest: string): InclusionProof | null {
    const pos = this.positions.get(digest);
    if (!pos || pos.state !== "sealed") return null;
    const batch = this.sealed.get(pos.batch_id);
    if (!batch) return null;
    return buildProof(batch.leaves, pos.leaf_index, batch.batch_id);
  }

  positionOf(digest: string): LeafPosition | undefined {
    const pos = this.positions.get(digest);
    return pos ? { ...pos } : undefined;
  }

  batch(batchId: string): SealedBatch | undefined {
    return this.sealed.get(batchId);
  }

  batches(): SealedBatch[] {
    return [...this.sealed.values()];
  }

  /** Re-install a previously sealed batch, e.g. when replaying a persisted log. */
  restore(batch: SealedBatch): void {
    if (merkleRoot(batch.leaves) !== batch.root || batch.leaves.length !== batch.leaf_count) {
      throw new ProofVerificationError(`Batch ${batch.batch_id} root does not match its leaves`, ["batch_root"]);
    }
    if (batchRootDigest(batch) !== batch.root_digest) {
      throw new ProofVerificationError(`Batch ${batch.batch_id} root digest mismatch`, ["batch_root_digest"]);
    }
    if (this.sealed.has(batch.batch_id)) return;
    const frozen = Object.freeze({ ...batch });
    this.sealed.set(batch.batch_id, frozen);
    batch.leaves.forEach((d, i) => this.positions.set(d, { batch_id: batch.batch_id, leaf_index: i, state: "sealed" }));
    const seq = Number.parseInt(batch.batch_id.replace(/^batch-/, ""), 10);
    if (Number.isFinite(seq)) this.seq = Math.max(this.seq, seq);
  }

  private closeOpen(): void {
    const open = this.open;
    if (!open || open.leaves.length === 0) return;
    this.open = null;

    const header = {
      batch_id: open.batch_id,
      root: merkleRoot(open.leaves),
      leaf_count: open.leaves.length,
      opened_at: isoAt(open.opened_at),
      sealed_at: isoAt(this.clock.now()),
    };
    this.closed.push({
      ...header,
      receipt_ids: [...open.receipt_ids],
      leaves: [...open.leaves],
      root_digest: batchRootDigest(header),
      threshold: this.opts.rootSigning.required,
    });
    for (const d of open.leaves) {
      const pos = this.positions.get(d);
      if (pos) pos.state = "closed";
    }
  }

  private markSealed(digest: string): void {
    const pos = this.positions.get(digest);
    if (pos) pos.state = "sealed";
  }
}
