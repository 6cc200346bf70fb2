import crypto, { type KeyObject } from "node:crypto";
import { SigningUnavailableError } from "../errors.js";

/**
 * Holder of private key material. The trust layer only ever sees public keys
 * and signature bytes; an HSM or KMS adapter implements the same contract.
 */
export interface SigningBackend {
  generateKey(keyId: string): Promise<{ publicKeyPem: string }>;
  sign(keyId: string, message: Buffer): Promise<Buffer>;
}

/** In-process Ed25519 keys. */
export class LocalKeyBackend implements SigningBackend {
  private readonly keys = new Map<string, KeyObject>();

  async generateKey(keyId: string): Promise<{ publicKeyPem: string }> {
    const { publicKey, privateKey } = crypto.generateKeyPairSync("ed25519");
    this.keys.set(keyId, privateKey);
    return { publicKeyPem: publicKey.export({ type: "spki", format: "pem" }).toString() };
  }

  async sign(keyId: string, message: Buffer): Promise<Buffer> {
    const key = this.keys.get(keyId);
    if (!key) throw new SigningUnavailableError(`No private key held for ${keyId}`);
    return crypto.sign(null, message, key);
  }
}
