import crypto from "node:crypto";
import type { Signature, SigningEntity, KeyVersion, TrustedKey } from "../types/trust.js";

const SIGNATURE_DOMAIN = "proofgate.signature/1";

/** Bytes actually signed: the digest bound to signer, key and signing time. */
export function signatureMessage(sig: Omit<Signature, "value" | "algorithm">, digest: string): Buffer {
  return Buffer.from(JSON.stringify([SIGNATURE_DOMAIN, sig.entity_id, sig.role, sig.key_id, sig.signed_at, digest]), "utf8");
}

function within(at: number, from: string, until: string | null): boolean {
  if (at < Date.parse(from)) return false;
  return until === null || at <= Date.parse(until);
}

export function toTrustedKey(entity: SigningEntity, key: KeyVersion): TrustedKey {
  return {
    ...key,
    entity_id: entity.entity_id,
    role: entity.role,
    entity_valid_from: entity.valid_from,
    entity_valid_until: entity.valid_until,
    revoked_at: entity.revoked_at,
  };
}

/**
 * Check a signature against one trusted key. Validity is checked at the
 * signature's own `signed_at`, so keys retired by rotation and entities
 * revoked later still verify what they signed while they were valid.
 */
export function verifySignature(digest: string, signature: Signature, key: TrustedKey): boolean {
  if (signature.algorithm !== "ed25519" || key.algorithm !== "ed25519") return false;
  if (signature.entity_id !== key.entity_id || signature.key_id !== key.key_id || signature.role !== key.role) {
    return false;
  }

  const at = Date.parse(signature.signed_at);
  if (Number.isNaN(at)) return false;
  if (!within(at, key.not_before, key.not_after)) return false;
  if (!within(at, key.entity_valid_from, key.entity_valid_until)) return false;
  if (key.revoked_at !== null && at >= Date.parse(key.revoked_at)) return false;

  try {
    const publicKey = crypto.createPublicKey(key.public_key_pem);
    return crypto.verify(null, signatureMessage(signature, digest), publicKey, Buffer.from(signature.value, "base64"));
  } catch {
    // Malformed key or signature bytes.
    return false;
  }
}

/** Find the trusted key a signature names and verify against it. */
export function verifyWithKeys(digest: string, signature: Signature, keys: readonly TrustedKey[]): boolean {
  const key = keys.find((k) => k.entity_id === signature.entity_id && k.key_id === signature.key_id);
  return key !== undefined && verifySignature(digest, signature, key);
}
