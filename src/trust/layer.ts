import { type Clock, isoAt, systemClock } from "../core/clock.js";
import { KeyedMutex } from "../core/concurrency.js";
import { DEFAULT_RETRY, type RetryPolicy, withRetry } from "../core/retry.js";
import {
  ProvenanceError,
  RevokedEntityError,
  SigningUnavailableError,
  UnknownEntityError,
} from "../errors.js";
import { type KeyVersion, type Role, type Signature, type SigningEntity, type TrustedKey, isRole } from "../types/trust.js";
import { type SigningBackend, LocalKeyBackend } from "./backend.js";
import { signatureMessage, toTrustedKey, verifySignature } from "./signature.js";

export type RegisterEntityOptions = {
  entityId: string;
  role: Role;
  validFrom?: string;
  validUntil?: string | null;
};

export type RotateKeyOptions = {
  /** When the new key starts signing. Defaults to now. */
  notBefore?: string;
  /** End of the previous key's window. Defaults to `notBefore`; later values overlap the keys. */
  retirePreviousAt?: string;
};

export type ThresholdOptions = {
  required: number;
  roles: readonly Role[];
  retry?: RetryPolicy;
};

function keyActiveAt(key: KeyVersion, at: number): boolean {
  if (at < Date.parse(key.not_before)) return false;
  return key.not_after === null || at <= Date.parse(key.not_after);
}

/** The earlier of two optional instants. */
function earliest(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(b) < Date.parse(a) ? b : a;
}

function cloneEntity(entity: SigningEntity): SigningEntity {
  return { ...entity, keys: entity.keys.map((k) => ({ ...k })) };
}

/**
 * Registry of signing entities and the single path to their keys. Passed by
 * reference to every component that signs or verifies.
 */
export class TrustLayer {
  private readonly entitiesById = new Map<string, SigningEntity>();
  private readonly signing = new KeyedMutex<string>();
  /** Key ids whose private half this layer's backend created. */
  private readonly held = new Set<string>();
  private readonly backend: SigningBackend;
  private readonly clock: Clock;

  constructor(opts: { backend?: SigningBackend; clock?: Clock } = {}) {
    this.backend = opts.backend ?? new LocalKeyBackend();
    this.clock = opts.clock ?? systemClock;
  }

  async registerEntity(opts: RegisterEntityOptions): Promise<SigningEntity> {
    if (this.entitiesById.has(opts.entityId)) {
      throw new ProvenanceError("DUPLICATE_ENTITY", `Signing entity already registered: ${opts.entityId}`);
    }
    const validFrom = opts.validFrom ?? isoAt(this.clock.now());
    const key = await this.newKey(opts.entityId, 1, validFrom);
    const entity: SigningEntity = {
      entity_id: opts.entityId,
      role: opts.role,
      valid_from: validFrom,
      valid_until: opts.validUntil ?? null,
      revoked_at: null,
      keys: [key],
    };
    this.entitiesById.set(entity.entity_id, entity);
    return cloneEntity(entity);
  }

  /**
   * Register a new entity, or give one known only from recorded keys a fresh
   * key of its own. An entity that already holds an active key is unchanged.
   */
  async enroll(opts: RegisterEntityOptions): Promise<SigningEntity> {
    const entity = this.entitiesById.get(opts.entityId);
    if (!entity) return this.registerEntity(opts);
    if (entity.role !== opts.role) {
      throw new ProvenanceError("KEY_CONFLICT", `Signing entity ${opts.entityId} is recorded as ${entity.role}, not ${opts.role}`);
    }
    if (this.signingKey(entity, this.clock.now()) === undefined) await this.rotateKey(opts.entityId);
    return cloneEntity(entity);
  }

  /**
   * Adopt a public key recorded by an earlier process. Imported keys verify
   * what they signed but never sign again. Repeated records of a key may only
   * narrow its window or move its entity's revocation earlier.
   */
  importKey(record: TrustedKey): void {
    if (!isRole(record.role)) {
      throw new ProvenanceError("KEY_CONFLICT", `Recorded key ${record.key_id} names an unknown role`);
    }
    const key: KeyVersion = {
      key_id: record.key_id,
      algorithm: record.algorithm,
      public_key_pem: record.public_key_pem,
      not_before: record.not_before,
      not_after: record.not_after,
    };
    const entity = this.entitiesById.get(record.entity_id);
    if (!entity) {
      this.entitiesById.set(record.entity_id, {
        entity_id: record.entity_id,
        role: record.role,
        valid_from: record.entity_valid_from,
        valid_until: record.entity_valid_until,
        revoked_at: record.revoked_at,
        keys: [key],
      });
      return;
    }

    if (entity.role !== record.role) {
      throw new ProvenanceError("KEY_CONFLICT", `Recorded key ${record.key_id} has role ${record.role}, entity has ${entity.role}`);
    }
    const known = entity.keys.find((k) => k.key_id === record.key_id);
    if (!known) {
      entity.keys.push(key);
    } else if (known.public_key_pem !== record.public_key_pem) {
      throw new ProvenanceError("KEY_CONFLICT", `Key ${record.key_id} was recorded with a different public key`);
    } else {
      known.not_after = earliest(known.not_after, record.not_after);
    }
    entity.revoked_at = earliest(entity.revoked_at, record.revoked_at);
  }

  /** Add a key version. The previous key keeps verifying signatures made inside its window. */
  async rotateKey(entityId: string, opts: RotateKeyOptions = {}): Promise<KeyVersion> {
    const entity = this.require(entityId);
    if (entity.revoked_at !== null) throw new RevokedEntityError(entityId, entity.revoked_at);

    const notBefore = opts.notBefore ?? isoAt(this.clock.now());
    const key = await this.newKey(entityId, entity.keys.length + 1, notBefore);
    const previous = entity.keys[entity.keys.length - 1];
    const retireAt = opts.retirePreviousAt ?? notBefore;
    if (previous.not_after === null || Date.parse(previous.not_after) > Date.parse(retireAt)) {
      previous.not_after = retireAt;
    }
    entity.keys.push(key);
    return { ...key };
  }

  /** Revoke from `at` (default now). Signatures dated before it stay valid. */
  revoke(entityId: string, at?: string): SigningEntity {
    const entity = this.require(entityId);
    const revokedAt = at ?? isoAt(this.clock.now());
    if (entity.revoked_at === null || Date.parse(revokedAt) < Date.parse(entity.revoked_at)) {
      entity.revoked_at = revokedAt;
    }
    return cloneEntity(entity);
  }

  entity(entityId: string): SigningEntity | undefined {
    const entity = this.entitiesById.get(entityId);
    return entity ? cloneEntity(entity) : undefined;
  }

  entities(role?: Role): SigningEntity[] {
    return [...this.entitiesById.values()].filter((e) => role === undefined || e.role === role).map(cloneEntity);
  }

  /** First entity of `role` able to sign right now, in registration order. */
  resolveSigner(role: Role): SigningEntity {
    const now = this.clock.now();
    const entity = [...this.entitiesById.values()].find((e) => e.role === role && this.canSign(e, now));
    if (!entity) throw new SigningUnavailableError(`No active signing entity for role ${role}`);
    return cloneEntity(entity);
  }

  async sign(digest: string, role: Role): Promise<Signature> {
    return this.signAs(this.resolveSigner(role).entity_id, digest);
  }

  /** Sign with a named entity. Calls for the same entity are serialized. */
  async signAs(entityId: string, digest: string): Promise<Signature> {
    return this.signing.run(entityId, async () => {
      const entity = this.require(entityId);
      const now = this.clock.now();
      if (entity.revoked_at !== null && now >= Date.parse(entity.revoked_at)) {
        throw new RevokedEntityError(entityId, entity.revoked_at);
      }
      if (now < Date.parse(entity.valid_from) || (entity.valid_until !== null && now > Date.parse(entity.valid_until))) {
        throw new SigningUnavailableError(`Signing entity ${entityId} is outside its validity interval`);
      }
      const key = this.signingKey(entity, now);
      if (!key) throw new SigningUnavailableError(`Signing entity ${entityId} has no key valid at ${isoAt(now)}`);

      const unsigned = { entity_id: entityId, role: entity.role, key_id: key.key_id, signed_at: isoAt(now) };
      let value: Buffer;
      try {
        value = await this.backend.sign(key.key_id, signatureMessage(unsigned, digest));
      } catch (err) {
        if (err instanceof ProvenanceError) throw err;
        throw new SigningUnavailableError(`Signing backend failed for ${entityId}`, err);
      }
      return { ...unsigned, algorithm: "ed25519", value: value.toString("base64") };
    });
  }

  /**
   * Collect signatures over `digest` from distinct eligible entities until at
   * least `required` are held. Successful signatures are kept across retries;
   * a set below threshold is never returned.
   */
  async signThreshold(digest: string, opts: ThresholdOptions): Promise<Signature[]> {
    const now = this.clock.now();
    const eligible = [...this.entitiesById.values()].filter((e) => opts.roles.includes(e.role) && this.canSign(e, now));
    if (eligible.length < opts.required) {
      throw new SigningUnavailableError(
        `Threshold ${opts.required} unreachable: ${eligible.length} eligible signer(s) for roles ${opts.roles.join(", ")}`,
      );
    }

    const collected = new Map<string, Signature>();
    await withRetry(async () => {
      const pending = eligible.filter((e) => !collected.has(e.entity_id));
      const results = await Promise.allSettled(pending.map((e) => this.signAs(e.entity_id, digest)));
      results.forEach((r, i) => {
        if (r.status === "fulfilled") collected.set(pending[i].entity_id, r.value);
      });
      if (collected.size < opts.required) {
        throw new SigningUnavailableError(`Collected ${collected.size} of ${opts.required} required signatures`);
      }
    }, opts.retry ?? DEFAULT_RETRY);

    return eligible.flatMap((e) => {
      const sig = collected.get(e.entity_id);
      return sig ? [sig] : [];
    });
  }

  verify(digest: string, signature: Signature, entity?: SigningEntity): boolean {
    const subject = entity ?? this.entitiesById.get(signature.entity_id);
    if (!subject || subject.entity_id !== signature.entity_id) return false;
    const key = subject.keys.find((k) => k.key_id === signature.key_id);
    return key !== undefined && verifySignature(digest, signature, toTrustedKey(subject, key));
  }

  /** Public keys of the given entities (all when omitted), for offline verification. */
  trustedKeys(entityIds?: Iterable<string>): TrustedKey[] {
    const wanted = entityIds ? new Set(entityIds) : null;
    return [...this.entitiesById.values()]
      .filter((e) => wanted === null || wanted.has(e.entity_id))
      .flatMap((e) => e.keys.map((k) => toTrustedKey(e, k)));
  }

  private require(entityId: string): SigningEntity {
    const entity = this.entitiesById.get(entityId);
    if (!entity) throw new UnknownEntityError(entityId);
    return entity;
  }

  private canSign(entity: SigningEntity, at: number): boolean {
    if (entity.revoked_at !== null && at >= Date.parse(entity.revoked_at)) return false;
    if (at < Date.parse(entity.valid_from)) return false;
    if (entity.valid_until !== null && at > Date.parse(entity.valid_until)) return false;
    return this.signingKey(entity, at) !== undefined;
  }

  /** Newest held key whose window contains `at`. */
  private signingKey(entity: SigningEntity, at: number): KeyVersion | undefined {
    for (let i = entity.keys.length - 1; i >= 0; i--) {
      const key = entity.keys[i];
      if (this.held.has(key.key_id) && keyActiveAt(key, at)) return key;
    }
    return undefined;
  }

  private async newKey(entityId: string, version: number, notBefore: string): Promise<KeyVersion> {
    const keyId = `${entityId}#${version}`;
    let publicKeyPem: string;
    try {
      ({ publicKeyPem } = await this.backend.generateKey(keyId));
    } catch (err) {
      throw new SigningUnavailableError(`Could not create key ${keyId}`, err);
    }
    this.held.add(keyId);
    return { key_id: keyId, algorithm: "ed25519", public_key_pem: publicKeyPem, not_before: notBefore, not_after: null };
  }
}
