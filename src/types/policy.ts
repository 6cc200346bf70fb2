import type { GateStatus } from "./gate.js";
import type { JsonObject } from "./json.js";
import type { Role } from "./trust.js";

export const ENFORCEMENT_ACTIONS = ["allow", "warn", "escalate", "block"] as const;

export type EnforcementAction = (typeof ENFORCEMENT_ACTIONS)[number];

/** Verdict status → action. Partial maps are layered over the defaults. */
export type EnforcementMap = Record<GateStatus, EnforcementAction>;

export type GatePolicyEntry = {
  name: string;
  enabled: boolean;
  thresholds?: Record<string, number>;
  parameters?: JsonObject;
  enforcement?: Partial<EnforcementMap>;
  timeout_ms?: number;
};

export type StageSettings = {
  fail_fast?: boolean;
  parallel?: boolean;
  gate_timeout_ms?: number;
  review_timeout_ms?: number;
  signer_role?: Role;
  enforcement?: Partial<EnforcementMap>;
};

export type StagePolicy = StageSettings & {
  gates: GatePolicyEntry[];
};

export type PolicyDocument = {
  policy_id: string;
  version: string;
  description?: string;
  defaults?: StageSettings;
  stages: Partial<Record<string, StagePolicy>>;
};

/** Exact policy version a decision was made under. */
export type PolicyRef = {
  policy_id: string;
  version: string;
  digest: string;
};
