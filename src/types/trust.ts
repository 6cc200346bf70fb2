export const ROLES = ["model_owner", "auditor", "platform_operator", "regulator"] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some((r) => r === value);
}

export type KeyVersion = {
  key_id: string;
  algorithm: "ed25519";
  public_key_pem: string;
  not_before: string;
  not_after: string | null;
};

export type SigningEntity = {
  entity_id: string;
  role: Role;
  valid_from: string;
  valid_until: string | null;
  revoked_at: string | null;
  keys: KeyVersion[];
};

export type Signature = {
  entity_id: string;
  role: Role;
  key_id: string;
  algorithm: "ed25519";
  signed_at: string;
  value: string;
};

/** One public key together with the entity facts needed to check it offline. */
export type TrustedKey = KeyVersion & {
  entity_id: string;
  role: Role;
  entity_valid_from: string;
  entity_valid_until: string | null;
  revoked_at: string | null;
};
