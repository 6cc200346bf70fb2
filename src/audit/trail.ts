import { type Clock, isoAt, systemClock } from "../core/clock.js";
import { KeyedMutex } from "../core/concurrency.js";
import { DEFAULT_RETRY, type RetryPolicy, withRetry } from "../core/retry.js";
import { canonicalJson, sha256Hex } from "../crypto/hash.js";
import { receiptBody, receiptDigest } from "../receipt/canonical.js";
import { verifyReceipt } from "../receipt/generator.js";
import { ProofVerificationError, ProvenanceError, errorMessage } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { Batcher } from "../merkle/batcher.js";
import type { TrustLayer } from "../trust/layer.js";
import { PROOF_BUNDLE_FORMAT, type ProofBundle } from "../types/bundle.js";
import type { SealedBatch } from "../types/merkle.js";
import type { Receipt, ReceiptKind } from "../types/receipt.js";
import type { Stage } from "../types/stage.js";
import { type AppendOnlyLog, type LogEntry, receiptsOf } from "./log.js";

export type ReceiptFilter = {
  operation_id?: string;
  lifecycle_id?: string;
  stage?: Stage;
  kind?: ReceiptKind;
  /** Inclusive lower bound on `timestamp.wall` (ISO-8601). */
  from?: string;
  /** Exclusive upper bound on `timestamp.wall` (ISO-8601). */
  to?: string;
};

export function matchesFilter(receipt: Receipt, filter: ReceiptFilter): boolean {
  if (filter.operation_id !== undefined && receipt.operation_id !== filter.operation_id) return false;
  if (filter.lifecycle_id !== undefined && receipt.lifecycle_id !== filter.lifecycle_id) return false;
  if (filter.stage !== undefined && receipt.stage !== filter.stage) return false;
  if (filter.kind !== undefined && receipt.kind !== filter.kind) return false;
  if (filter.from !== undefined && receipt.timestamp.wall < filter.from) return false;
  if (filter.to !== undefined && receipt.timestamp.wall >= filter.to) return false;
  return true;
}

/**
 * Lazy view over the log. Nothing is read until iteration starts, and every
 * iteration starts again from the beginning of the log.
 */
export class ReceiptQuery implements AsyncIterable<Receipt> {
  constructor(private readonly log: AppendOnlyLog, private readonly filter: ReceiptFilter) {}

  async *[Symbol.asyncIterator](): AsyncIterator<Receipt> {
    for await (const entry of this.log.read()) {
      for (const receipt of receiptsOf(entry)) {
        if (matchesFilter(receipt, this.filter)) yield receipt;
      }
    }
  }

  async toArray(): Promise<Receipt[]> {
    const out: Receipt[] = [];
    for await (const r of this) out.push(r);
    return out;
  }
}

export type AuditTrailOptions = {
  log: AppendOnlyLog;
  trust: TrustLayer;
  batcher: Batcher;
  retry?: RetryPolicy;
  logger?: Logger;
  clock?: Clock;
};

export type ExportOptions = {
  stage?: Stage;
  receiptId?: string;
  kind?: ReceiptKind;
};

/**
 * Append-only evidentiary record. Accepted receipts are persisted, batched in
 * arrival order and sealed under signed Merkle roots; proof bundles are
 * assembled from them for offline verification.
 */
export class AuditTrail {
  private readonly receipts = new Map<string, Receipt>();
  private readonly order: string[] = [];
  private readonly persistedBatches = new Set<string>();
  private readonly persistedKeys = new Set<string>();
  private readonly lock = new KeyedMutex<string>();
  private readonly log: AppendOnlyLog;
  private readonly trust: TrustLayer;
  private readonly batcher: Batcher;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: AuditTrailOptions) {
    this.log = opts.log;
    this.trust = opts.trust;
    this.batcher = opts.batcher;
    this.retry = opts.retry ?? DEFAULT_RETRY;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Rebuild in-memory state from the log. Recorded signer keys are imported
   * into the trust layer; receipt digests are always checked, signatures
   * whenever the signer is known.
   */
  async load(): Promise<void> {
    await this.lock.run("append", async () => {
      const unbatched: Receipt[] = [];
      for await (const entry of this.log.read()) {
        if (entry.kind === "key") {
          this.trust.importKey(entry.key);
          this.persistedKeys.add(entry.id);
          continue;
        }
        if (entry.kind === "batch") {
          this.batcher.restore(entry.batch);
          this.persistedBatches.add(entry.batch.batch_id);
          continue;
        }
        for (const receipt of receiptsOf(entry)) {
          if (this.receipts.has(receipt.receipt_id)) continue;
          this.checkStored(receipt);
          this.receipts.set(receipt.receipt_id, receipt);
          this.order.push(receipt.receipt_id);
          unbatched.push(receipt);
        }
      }
      for (const r of unbatched) {
        if (!this.batcher.positionOf(r.digest)) this.batcher.add(r.receipt_id, r.digest);
      }
    });
  }

  /**
   * Verify and persist a receipt, then add it to the open batch. Appending a
   * receipt id that is already present is a no-op and resolves false.
   */
  async append(receipt: Receipt): Promise<boolean> {
    return (await this.appendAll([receipt])) > 0;
  }

  /**
   * Verify and persist receipts as a single log entry, so either all of them
   * are recorded or none is. Receipts already present are skipped. Resolves
   * the number appended.
   */
  async appendAll(receipts: readonly Receipt[]): Promise<number> {
    return this.lock.run("append", async () => {
      const fresh = receipts.filter(
        (r, i) => !this.receipts.has(r.receipt_id) && receipts.findIndex((o) => o.receipt_id === r.receipt_id) === i,
      );
      if (fresh.length === 0) return 0;
      for (const r of fresh) {
        if (!verifyReceipt(r, (d, sig) => this.trust.verify(d, sig))) {
          throw new ProofVerificationError(`Receipt ${r.receipt_id} failed verification`, ["receipt_digest", "receipt_signature"]);
        }
      }

      await this.persistKeys(fresh.map((r) => r.signer.entity_id));
      const last = fresh[fresh.length - 1];
      const entry: LogEntry =
        fresh.length === 1
          ? { kind: "receipt", id: last.receipt_id, receipt: last }
          : { kind: "receipts", id: last.receipt_id, receipts: [...fresh] };
      await withRetry(() => this.log.append(entry), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn("AUDIT_APPEND_RETRY", `Append of ${last.receipt_id} failed: ${errorMessage(err)}`, {
            attempt,
            delay_ms: delayMs,
          }),
      });
      for (const r of fresh) {
        this.receipts.set(r.receipt_id, r);
        this.order.push(r.receipt_id);
        this.batcher.add(r.receipt_id, r.digest);
      }

      if (this.batcher.isDue()) {
        try {
          await this.sealLocked();
        } catch (err) {
          // The receipts are already persisted; the closed batch is re-signed on the next seal.
          this.logger.warn("BATCH_SEAL_DEFERRED", `Batch sealing deferred: ${errorMessage(err)}`, {
            receipt_id: last.receipt_id,
          });
        }
      }
      return fresh.length;
    });
  }

  /** Seal whatever is pending. Throws when the root cannot reach its signature threshold. */
  async sealPending(): Promise<SealedBatch | null> {
    return this.lock.run("append", () => this.sealLocked());
  }

  query(filter: ReceiptFilter = {}): ReceiptQuery {
    return new ReceiptQuery(this.log, filter);
  }

  receipt(receiptId: string): Receipt | undefined {
    return this.receipts.get(receiptId);
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Proof bundle for one receipt of an operation: by default its latest gate
   * receipt (optionally for one stage). Pending receipts are sealed first.
   */
  async exportProofBundle(operationId: string, opts: ExportOptions = {}): Promise<ProofBundle> {
    const receipt = this.pick(operationId, opts);
    return this.bundleFor(receipt);
  }

  /** Bundles for every receipt of an operation, in arrival order. */
  async exportProofBundles(operationId: string): Promise<ProofBundle[]> {
    const bundles: ProofBundle[] = [];
    for (const id of this.order) {
      const r = this.receipts.get(id);
      if (r && r.operation_id === operationId) bundles.push(await this.bundleFor(r));
    }
    return bundles;
  }

  private pick(operationId: string, opts: ExportOptions): Receipt {
    if (opts.receiptId !== undefined) {
      const r = this.receipts.get(opts.receiptId);
      if (!r || r.operation_id !== operationId) {
        throw new ProvenanceError("RECEIPT_NOT_FOUND", `Receipt ${opts.receiptId} not found for operation ${operationId}`);
      }
      return r;
    }
    const kind = opts.kind ?? "gate";
    for (let i = this.order.length - 1; i >= 0; i--) {
      const r = this.receipts.get(this.order[i]);
      if (r && r.operation_id === operationId && r.kind === kind && (opts.stage === undefined || r.stage === opts.stage)) {
        return r;
      }
    }
    const where = opts.stage ? ` at stage ${opts.stage}` : "";
    throw new ProvenanceError("RECEIPT_NOT_FOUND", `No ${kind} receipt for operation ${operationId}${where}`);
  }

  private async bundleFor(receipt: Receipt): Promise<ProofBundle> {
    let proof = this.batcher.prove(receipt.digest);
    if (!proof) {
      await this.sealPending();
      proof = this.batcher.prove(receipt.digest);
    }
    const batch = proof ? this.batcher.batch(proof.batch_id) : undefined;
    if (!proof || !batch) {
      throw new ProofVerificationError(`Receipt ${receipt.receipt_id} is not in a sealed batch`, ["inclusion"]);
    }

    const { receipt_ids: _ids, leaves: _leaves, ...header } = batch;
    const signers = new Set([receipt.signer.entity_id, ...batch.signatures.map((s) => s.entity_id)]);
    return {
      format: PROOF_BUNDLE_FORMAT,
      exported_at: isoAt(this.clock.now()),
      receipt: structuredClone(receipt),
      inclusion_proof: proof,
      batch: structuredClone(header),
      trusted_keys: this.trust.trustedKeys(signers),
    };
  }

  private checkStored(receipt: Receipt): void {
    if (receiptDigest(receiptBody(receipt)) !== receipt.digest) {
      throw new ProofVerificationError(`Stored receipt ${receipt.receipt_id} does not match its digest`, ["receipt_digest"]);
    }
    if (!this.trust.entity(receipt.signer.entity_id)) {
      this.logger.warn("RECEIPT_SIGNER_UNKNOWN", `Signer of ${receipt.receipt_id} is not registered; signature not checked`, {
        receipt_id: receipt.receipt_id,
        entity_id: receipt.signer.entity_id,
      });
      return;
    }
    if (!verifyReceipt(receipt, (d, s) => this.trust.verify(d, s))) {
      throw new ProofVerificationError(`Stored receipt ${receipt.receipt_id} has an invalid signature`, ["receipt_signature"]);
    }
  }

  /** Record signer keys ahead of what they sign. A key whose window changed is recorded again. */
  private async persistKeys(entityIds: Iterable<string>): Promise<void> {
    for (const key of this.trust.trustedKeys(entityIds)) {
      const id = `${key.key_id}@${sha256Hex(canonicalJson(key)).slice(0, 16)}`;
      if (this.persistedKeys.has(id)) continue;
      await withRetry(() => this.log.append({ kind: "key", id, key }), this.retry);
      this.persistedKeys.add(id);
    }
  }

  private async sealLocked(): Promise<SealedBatch | null> {
    const sealed = await this.batcher.sealBatch();
    for (const batch of this.batcher.batches()) {
      if (this.persistedBatches.has(batch.batch_id)) continue;
      await this.persistKeys(batch.signatures.map((sig) => sig.entity_id));
      await withRetry(() => this.log.append({ kind: "batch", id: batch.batch_id, batch }), this.retry);
      this.persistedBatches.add(batch.batch_id);
    }
    return sealed;
  }
}
