import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { ProofgateConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

const ENV_PREFIX = "PROOFGATE_";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
export function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isPlainObject(parsed) ? parsed : {};
}

function coerce(raw: string, current: unknown): unknown {
  if (Array.isArray(current)) {
    return raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  if (raw === "true" || raw === "false") return raw === "true";
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

/**
 * Apply PROOFGATE_ prefixed environment variables. A double underscore
 * descends one level: PROOFGATE_BATCH__MAX_RECEIPTS → batch.max_receipts.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let current: unknown = result;
    for (const s of segments) current = isPlainObject(current) ? current[s] : undefined;

    let patch: Record<string, unknown> = { [segments[segments.length - 1]]: coerce(value, current) };
    for (let i = segments.length - 2; i >= 0; i--) patch = { [segments[i]]: patch };
    result = deepMerge(result, patch);
  }
  return result;
}

/** Layered configuration before validation: base.yaml ← {env}.yaml ← environment variables. */
export function loadRawConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

/**
 * Load and validate layered config.
 *
 * @param envName - Optional environment name; loads `config/{envName}.yaml` as an override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): ProofgateConfig {
  const result = validateConfig(loadRawConfig(envName, configDir, env));
  if (!result.valid) {
    throw new Error(`Invalid configuration: ${result.errors}`);
  }
  return result.config;
}
