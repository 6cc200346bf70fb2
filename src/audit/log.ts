import type { SealedBatch } from "../types/merkle.js";
import type { Receipt } from "../types/receipt.js";
import { type TrustedKey, isRole } from "../types/trust.js";

/**
 * `receipts` holds receipts that must land together (a review and the gate
 * receipt that cites it); `key` records a signer's public key as it stood.
 */
export type LogEntry =
  | { kind: "receipt"; id: string; receipt: Receipt }
  | { kind: "receipts"; id: string; receipts: Receipt[] }
  | { kind: "batch"; id: string; batch: SealedBatch }
  | { kind: "key"; id: string; key: TrustedKey };

/** Receipts carried by an entry, in the order they were written. */
export function receiptsOf(entry: LogEntry): Receipt[] {
  switch (entry.kind) {
    case "receipt":
      return [entry.receipt];
    case "receipts":
      return entry.receipts;
    case "batch":
    case "key":
      return [];
  }
}

/** Entry positions, `from` inclusive and `to` exclusive. */
export type LogRange = { from?: number; to?: number };

/**
 * Write-once, read-many storage behind the audit trail. `append` is idempotent
 * on the entry id and resolves false when the id was already present.
 */
export interface AppendOnlyLog {
  append(entry: LogEntry): Promise<boolean>;
  read(range?: LogRange): AsyncIterable<LogEntry>;
}

function hasString(value: object, key: string): boolean {
  return typeof Reflect.get(value, key) === "string";
}

function isStoredReceipt(value: unknown): boolean {
  return typeof value === "object" && value !== null && hasString(value, "receipt_id") && hasString(value, "digest");
}

/** Shape check for entries read back from storage; receipts are verified separately. */
export function isLogEntry(value: unknown): value is LogEntry {
  if (typeof value !== "object" || value === null) return false;
  const kind: unknown = Reflect.get(value, "kind");
  if (!hasString(value, "id")) return false;
  if (kind === "receipt") return isStoredReceipt(Reflect.get(value, "receipt"));
  if (kind === "receipts") {
    const receipts: unknown = Reflect.get(value, "receipts");
    return Array.isArray(receipts) && receipts.length > 0 && receipts.every(isStoredReceipt);
  }
  if (kind === "key") {
    const key: unknown = Reflect.get(value, "key");
    return (
      typeof key === "object" &&
      key !== null &&
      hasString(key, "key_id") &&
      hasString(key, "entity_id") &&
      hasString(key, "public_key_pem") &&
      hasString(key, "not_before") &&
      hasString(key, "entity_valid_from") &&
      isRole(Reflect.get(key, "role"))
    );
  }
  if (kind === "batch") {
    const batch: unknown = Reflect.get(value, "batch");
    return typeof batch === "object" && batch !== null && hasString(batch, "batch_id") && hasString(batch, "root");
  }
  return false;
}

export class MemoryLog implements AppendOnlyLog {
  private readonly entries: LogEntry[] = [];
  private readonly ids = new Set<string>();

  async append(entry: LogEntry): Promise<boolean> {
    const key = `${entry.kind}:${entry.id}`;
    if (this.ids.has(key)) return false;
    this.ids.add(key);
    this.entries.push(structuredClone(entry));
    return true;
  }

  async *read(range: LogRange = {}): AsyncIterable<LogEntry> {
    const end = Math.min(range.to ?? this.entries.length, this.entries.length);
    for (let i = range.from ?? 0; i < end; i++) yield structuredClone(this.entries[i]);
  }

  get size(): number {
    return this.entries.length;
  }
}
