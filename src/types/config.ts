import type { Role } from "./trust.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "jsonl" | "human";

export type BatchConfig = {
  max_receipts: number;
  max_age_ms: number;
  root_threshold: number;
  root_signer_roles: Role[];
};

export type SigningConfig = {
  receipt_role: Role;
  retry_attempts: number;
  retry_base_delay_ms: number;
  retry_max_delay_ms: number;
};

export type ProofgateConfig = {
  schema_version: string;
  audit_dir: string;
  policy_file: string;
  batch: BatchConfig;
  signing: SigningConfig;
  gates: { default_timeout_ms: number };
  review: { timeout_ms: number };
  logging: { level: LogLevel; format: LogFormat; diagnostics_file: string };
};
