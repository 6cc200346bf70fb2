import crypto from "node:crypto";
import type { EvidenceRef } from "../types/gate.js";

const HEX_DIGEST = /^[0-9a-f]{64}$/;

export function sha256(data: string | Uint8Array): Buffer {
  return crypto.createHash("sha256").update(data).digest();
}

export function sha256Hex(data: string | Uint8Array): string {
  return sha256(data).toString("hex");
}

export function hmacSha256(key: Uint8Array, data: string): Buffer {
  return crypto.createHmac("sha256", key).update(data, "utf8").digest();
}

export function isHexDigest(value: unknown): value is string {
  return typeof value === "string" && HEX_DIGEST.test(value);
}

/** Constant-time comparison of two hex strings. */
export function hexEquals(a: string, b: string): boolean {
  const left = Buffer.from(a, "hex");
  const right = Buffer.from(b, "hex");
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * JSON with object keys sorted by code unit and no whitespace.
 * Undefined members are dropped the way JSON.stringify drops them.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value === "boolean" || typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new TypeError(`Cannot canonicalize non-finite number: ${value}`);
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? "null" : canonicalJson(item))).join(",")}]`;
  }
  if (typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${members.join(",")}}`;
  }
  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`);
}

/** Digest of an operation's evidence references, independent of their order. */
export function evidenceDigest(evidence: readonly EvidenceRef[]): string {
  const sorted = [...evidence].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return sha256Hex(canonicalJson(sorted));
}
