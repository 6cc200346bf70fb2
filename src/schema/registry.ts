import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { type AjvInstance, type ValidateFunction, conforms, loadAjv } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: object;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

/**
 * Discovers the `*.schema.json` files of a directory and compiles validators
 * on demand.
 */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly validators = new Map<string, ValidateFunction>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
        throw new Error(`Schema is not an object: ${filePath}`);
      }
      // "policy.schema.json" → "policy"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
    return this;
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) result[name] = entry.version;
    return result;
  }

  validator(name: string): ValidateFunction {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate `data` against a named schema, narrowing it on success. */
  check<T>(name: string, data: unknown): SchemaCheck<T> {
    const validate = this.validator(name);
    if (conforms<T>(validate, data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

/** Version from an explicit `version` member or the `@x.y.z` suffix of `$id`. */
function extractVersion(schema: object): string | null {
  const version: unknown = Reflect.get(schema, "version");
  if (typeof version === "string") return version;

  const id: unknown = Reflect.get(schema, "$id");
  if (typeof id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(id);
    if (m) return m[1];
  }
  return null;
}

/** Create and load a registry, by default from the project's schemas directory. */
export function createSchemaRegistry(schemaDir?: string): SchemaRegistry {
  return new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR).load();
}
