import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { PolicyValidationError } from "../errors.js";
import { type SchemaRegistry, createSchemaRegistry } from "../schema/registry.js";
import type { PolicyDocument } from "../types/policy.js";

/** Validate a parsed policy document against the policy schema and semantic rules. */
export function parsePolicy(raw: unknown, schemas: SchemaRegistry = createSchemaRegistry(), source?: string): PolicyDocument {
  const checked = schemas.check<PolicyDocument>("policy", raw);
  if (!checked.valid) {
    throw new PolicyValidationError(`Policy does not match schema: ${checked.errors}`, source);
  }

  for (const [stage, stagePolicy] of Object.entries(checked.value.stages)) {
    const seen = new Set<string>();
    for (const gate of stagePolicy?.gates ?? []) {
      if (seen.has(gate.name)) {
        throw new PolicyValidationError(`Gate "${gate.name}" listed twice for stage ${stage}`, source);
      }
      seen.add(gate.name);
    }
  }
  return checked.value;
}

/** Read a policy from a .yaml, .yml or .json file. */
export function loadPolicyFile(filePath: string, schemas?: SchemaRegistry): PolicyDocument {
  if (!fs.existsSync(filePath)) {
    throw new PolicyValidationError(`Policy file not found: ${filePath}`);
  }
  const text = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let raw: unknown;
  try {
    raw = ext === ".json" ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    throw new PolicyValidationError(`Policy is not parseable: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }
  return parsePolicy(raw, schemas, filePath);
}
