import fs from "node:fs";
import path from "node:path";
import { loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { loadPolicyFile } from "../policy/loader.js";
import { type SchemaRegistry, createSchemaRegistry } from "../schema/registry.js";
import { type Diagnostic, describeError, diag } from "./diagnostic.js";

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

function listYamlFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && (e.name.endsWith(".yml") || e.name.endsWith(".yaml")))
    .map((e) => path.join(dir, e.name))
    .sort();
}

function envName(file: string): string {
  return path.basename(file).replace(/\.ya?ml$/, "");
}

/**
 * Validate every configuration layer in `configDir` (base alone, then base
 * under each environment file), the configured policy file and every policy in
 * `configDir/policies`.
 */
export async function validateAll(opts: {
  configDir: string;
  baseDir?: string;
  policyFiles?: string[];
  schemaDir?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const checked: string[] = [];

  const configDir = path.resolve(opts.configDir);
  const baseDir = path.resolve(opts.baseDir ?? process.cwd());

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }
  const basePath = path.join(configDir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    return { ok: false, errors: [diag("error", "CONFIG_BASE_MISSING", `Missing base config: ${basePath}`, { path: basePath })] };
  }

  let schemas: SchemaRegistry;
  try {
    schemas = createSchemaRegistry(opts.schemaDir);
  } catch (e) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", describeError(e))] };
  }

  const policyPaths = new Set<string>();
  const layers = [basePath, ...listYamlFiles(configDir).filter((f) => f !== basePath)];

  for (const file of layers) {
    const name = file === basePath ? undefined : envName(file);
    const label = path.relative(process.cwd(), file);
    try {
      const result = validateConfig(loadRawConfig(name, configDir, opts.env));
      if (!result.valid) {
        errors.push(diag("error", "CONFIG_INVALID", `Config invalid (${label}): ${result.errors}`, { path: file }));
        continue;
      }
      checked.push(file);
      policyPaths.add(path.resolve(baseDir, result.config.policy_file));
    } catch (e) {
      errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config (${label}): ${describeError(e)}`, { path: file }));
    }
  }

  for (const file of listYamlFiles(path.join(configDir, "policies"))) policyPaths.add(file);
  for (const file of opts.policyFiles ?? []) policyPaths.add(path.resolve(file));

  for (const file of policyPaths) {
    if (!fs.existsSync(file)) {
      errors.push(diag("error", "POLICY_FILE_MISSING", `Policy file not found: ${file}`, { path: file }));
      continue;
    }
    try {
      loadPolicyFile(file, schemas);
      checked.push(file);
    } catch (e) {
      errors.push(diag("error", "POLICY_INVALID", describeError(e), { path: file }));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
