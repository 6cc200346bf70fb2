import crypto from "node:crypto";
import { hexEquals, hmacSha256, sha256Hex } from "../crypto/hash.js";
import { InvalidParentError } from "../errors.js";
import { type AnchorPosition, type Stage, STAGES, previousPosition } from "../types/stage.js";

const ANCHOR_DOMAIN = "proofgate.anchor/1";
const ANCHOR_ID_PREFIX = "proofgate.anchor-id/1:";
const MIN_ROOT_SECRET_BYTES = 32;

/** Public part of an anchor; safe to publish alongside receipts. */
export type AnchorInfo = Readonly<{
  lifecycle_id: string;
  stage: AnchorPosition;
  anchor_id: string;
  parent_id: string | null;
  salt: string;
  nonce: string;
}>;

/** Anchor with its derivation material. Material never leaves the chain owner. */
export type Anchor = AnchorInfo & Readonly<{ material: string }>;

function anchorId(material: string): string {
  return sha256Hex(ANCHOR_ID_PREFIX + material);
}

function toSecretBytes(rootSecret: Uint8Array | string): Buffer {
  const bytes = typeof rootSecret === "string" ? Buffer.from(rootSecret, "utf8") : Buffer.from(rootSecret);
  if (bytes.length < MIN_ROOT_SECRET_BYTES) {
    throw new InvalidParentError(`Root secret must be at least ${MIN_ROOT_SECRET_BYTES} bytes`);
  }
  return bytes;
}

export function rootAnchor(rootSecret: Uint8Array | string, lifecycleId: string, nonce: string): Anchor {
  const material = hmacSha256(toSecretBytes(rootSecret), JSON.stringify([ANCHOR_DOMAIN, "root", lifecycleId, nonce])).toString(
    "hex",
  );
  return Object.freeze({
    lifecycle_id: lifecycleId,
    stage: "root",
    anchor_id: anchorId(material),
    parent_id: null,
    salt: "",
    nonce,
    material,
  });
}

/**
 * Derive the anchor for `stage` from its parent. Keyed by the parent's
 * material, so the child reveals nothing about the parent and only a holder of
 * the parent can produce it. Deterministic in (parent, stage, salt).
 */
export function deriveAnchor(parent: Anchor, stage: Stage, salt: string): Anchor {
  const expected = previousPosition(stage);
  if (parent.stage !== expected) {
    throw new InvalidParentError(`Anchor for ${stage} must derive from ${expected}, got ${parent.stage}`);
  }
  const material = hmacSha256(
    Buffer.from(parent.material, "hex"),
    JSON.stringify([ANCHOR_DOMAIN, stage, salt, parent.nonce, parent.anchor_id]),
  ).toString("hex");
  return Object.freeze({
    lifecycle_id: parent.lifecycle_id,
    stage,
    anchor_id: anchorId(material),
    parent_id: parent.anchor_id,
    salt,
    nonce: parent.nonce,
    material,
  });
}

export function publicAnchor(anchor: Anchor): AnchorInfo {
  const { material: _material, ...info } = anchor;
  return Object.freeze(info);
}

/**
 * Anchor chain of one lifecycle instance. Derivation is synchronous, so two
 * callers can never interleave inside it; a stage derives at most one anchor.
 */
export class AnchorChain {
  private readonly byPosition = new Map<AnchorPosition, Anchor>();

  private constructor(readonly lifecycleId: string, readonly nonce: string, root: Anchor) {
    this.byPosition.set("root", root);
  }

  static open(lifecycleId: string, rootSecret: Uint8Array | string, opts: { nonce?: string } = {}): AnchorChain {
    const nonce = opts.nonce ?? crypto.randomBytes(16).toString("hex");
    return new AnchorChain(lifecycleId, nonce, rootAnchor(rootSecret, lifecycleId, nonce));
  }

  root(): Anchor {
    const root = this.byPosition.get("root");
    if (!root) throw new InvalidParentError("Anchor chain has no root");
    return root;
  }

  get(position: AnchorPosition): Anchor | undefined {
    return this.byPosition.get(position);
  }

  /**
   * Derive from an explicitly supplied parent, which must be the recorded
   * anchor of the previous stage. Repeating a derivation returns the recorded
   * anchor; a different salt for an anchored stage is a divergent history.
   */
  derive(parent: Anchor, stage: Stage, salt: string): Anchor {
    const position = previousPosition(stage);
    const recorded = this.byPosition.get(position);
    if (!recorded) {
      throw new InvalidParentError(`Cannot derive ${stage}: no ${position} anchor in lifecycle ${this.lifecycleId}`);
    }
    if (parent.anchor_id !== recorded.anchor_id || !hexEquals(parent.material, recorded.material)) {
      throw new InvalidParentError(`Supplied parent is not the ${position} anchor of lifecycle ${this.lifecycleId}`);
    }

    const existing = this.byPosition.get(stage);
    if (existing) {
      if (existing.salt !== salt) {
        throw new InvalidParentError(`Stage ${stage} of lifecycle ${this.lifecycleId} is already anchored with a different salt`);
      }
      return existing;
    }

    const anchor = deriveAnchor(recorded, stage, salt);
    this.byPosition.set(stage, anchor);
    return anchor;
  }

  /** Derive the next stage from the recorded previous anchor. */
  next(stage: Stage, salt = ""): Anchor {
    const parent = this.byPosition.get(previousPosition(stage));
    if (!parent) {
      throw new InvalidParentError(`Cannot anchor ${stage} before ${previousPosition(stage)} in lifecycle ${this.lifecycleId}`);
    }
    return this.derive(parent, stage, salt);
  }

  anchors(): AnchorInfo[] {
    const order: AnchorPosition[] = ["root", ...STAGES];
    return order.flatMap((p) => {
      const a = this.byPosition.get(p);
      return a ? [publicAnchor(a)] : [];
    });
  }
}

export type AnchorChainCheck = { valid: true } | { valid: false; position: AnchorPosition; reason: string };

/** Re-derive a published chain from the root secret and compare every link. */
export function verifyAnchorChain(
  rootSecret: Uint8Array | string,
  lifecycleId: string,
  nonce: string,
  published: readonly AnchorInfo[],
): AnchorChainCheck {
  let parent = rootAnchor(rootSecret, lifecycleId, nonce);
  const first = published[0];
  if (!first || first.stage !== "root" || first.anchor_id !== parent.anchor_id) {
    return { valid: false, position: "root", reason: "root anchor does not match" };
  }

  for (const info of published.slice(1)) {
    if (info.stage === "root") return { valid: false, position: "root", reason: "duplicate root" };
    if (info.parent_id !== parent.anchor_id) {
      return { valid: false, position: info.stage, reason: "parent link broken" };
    }
    let derived: Anchor;
    try {
      derived = deriveAnchor(parent, info.stage, info.salt);
    } catch (err) {
      if (!(err instanceof InvalidParentError)) throw err;
      return { valid: false, position: info.stage, reason: err.message };
    }
    if (derived.anchor_id !== info.anchor_id) {
      return { valid: false, position: info.stage, reason: "anchor id does not re-derive" };
    }
    parent = derived;
  }
  return { valid: true };
}
