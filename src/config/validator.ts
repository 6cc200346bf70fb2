import { conforms, loadAjv } from "../schema/ajv.js";
import type { ProofgateConfig } from "../types/config.js";
import { ROLES } from "../types/trust.js";

const positiveInt = { type: "integer", minimum: 1 } as const;
const nonNegativeInt = { type: "integer", minimum: 0 } as const;

export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "audit_dir", "policy_file", "batch", "signing", "gates", "review", "logging"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    audit_dir: { type: "string", minLength: 1 },
    policy_file: { type: "string", minLength: 1 },
    batch: {
      type: "object",
      additionalProperties: false,
      required: ["max_receipts", "max_age_ms", "root_threshold", "root_signer_roles"],
      properties: {
        max_receipts: positiveInt,
        max_age_ms: nonNegativeInt,
        root_threshold: positiveInt,
        root_signer_roles: { type: "array", minItems: 1, items: { type: "string", enum: [...ROLES] } },
      },
    },
    signing: {
      type: "object",
      additionalProperties: false,
      required: ["receipt_role", "retry_attempts", "retry_base_delay_ms", "retry_max_delay_ms"],
      properties: {
        receipt_role: { type: "string", enum: [...ROLES] },
        retry_attempts: positiveInt,
        retry_base_delay_ms: nonNegativeInt,
        retry_max_delay_ms: nonNegativeInt,
      },
    },
    gates: {
      type: "object",
      additionalProperties: false,
      required: ["default_timeout_ms"],
      properties: { default_timeout_ms: positiveInt },
    },
    review: {
      type: "object",
      additionalProperties: false,
      required: ["timeout_ms"],
      properties: { timeout_ms: positiveInt },
    },
    logging: {
      type: "object",
      additionalProperties: false,
      required: ["level", "format", "diagnostics_file"],
      properties: {
        level: { type: "string", enum: ["debug", "info", "warn", "error"] },
        format: { type: "string", enum: ["jsonl", "human"] },
        diagnostics_file: { type: "string", minLength: 1 },
      },
    },
  },
};

export type ConfigValidationResult = { valid: true; config: ProofgateConfig } | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  if (conforms<ProofgateConfig>(validate, config)) {
    if (config.signing.retry_max_delay_ms < config.signing.retry_base_delay_ms) {
      return { valid: false, errors: "signing.retry_max_delay_ms must not be below signing.retry_base_delay_ms" };
    }
    return { valid: true, config };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
