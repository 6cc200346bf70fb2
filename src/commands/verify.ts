import fs from "node:fs";
import path from "node:path";
import { type BundleReport, parseProofBundle, parseTrustedKeys, verifyProofBundle } from "../audit/verify-bundle.js";
import { createSchemaRegistry } from "../schema/registry.js";
import type { TrustedKey } from "../types/trust.js";
import { type Diagnostic, describeError, diag } from "./diagnostic.js";

export type VerifyResult =
  | {
      ok: true;
      receiptId: string;
      report: BundleReport;
      /** True when the bundle was checked against its own embedded keys. */
      selfKeyed: boolean;
    }
  | { ok: false; errors: Diagnostic[]; report?: BundleReport };

function readJson(filePath: string, code: string): { ok: true; value: unknown } | { ok: false; error: Diagnostic } {
  if (!fs.existsSync(filePath)) {
    return { ok: false, error: diag("error", `${code}_MISSING`, `File not found: ${filePath}`, { path: filePath }) };
  }
  try {
    const value: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return { ok: true, value };
  } catch (e) {
    return {
      ok: false,
      error: diag("error", `${code}_JSON_INVALID`, `Invalid JSON (${path.basename(filePath)}): ${describeError(e)}`, {
        path: filePath,
      }),
    };
  }
}

/**
 * Verify an exported proof bundle offline. `keysPath` names a JSON array of
 * trusted keys; without it only the bundle's internal consistency is checked.
 */
export function verifyBundleFile(opts: {
  bundlePath: string;
  keysPath?: string;
  minThreshold?: number;
  schemaDir?: string;
}): VerifyResult {
  const schemas = createSchemaRegistry(opts.schemaDir);
  const bundlePath = path.resolve(opts.bundlePath);

  const rawBundle = readJson(bundlePath, "BUNDLE");
  if (!rawBundle.ok) return { ok: false, errors: [rawBundle.error] };

  let trustedKeys: TrustedKey[] | undefined;
  if (opts.keysPath) {
    const keysPath = path.resolve(opts.keysPath);
    const rawKeys = readJson(keysPath, "KEYS");
    if (!rawKeys.ok) return { ok: false, errors: [rawKeys.error] };
    try {
      trustedKeys = parseTrustedKeys(rawKeys.value, schemas);
    } catch (e) {
      return { ok: false, errors: [diag("error", "KEYS_INVALID", describeError(e), { path: keysPath })] };
    }
  }

  let report: BundleReport;
  let receiptId: string;
  try {
    const bundle = parseProofBundle(rawBundle.value, schemas);
    receiptId = bundle.receipt.receipt_id;
    report = verifyProofBundle(bundle, { trustedKeys, minThreshold: opts.minThreshold });
  } catch (e) {
    return { ok: false, errors: [diag("error", "BUNDLE_INVALID", describeError(e), { path: bundlePath })] };
  }

  if (!report.valid) {
    const errors = report.checks
      .filter((c) => !c.ok)
      .map((c) =>
        diag("error", "BUNDLE_CHECK_FAILED", `Check failed: ${c.name}${c.detail ? ` (${c.detail})` : ""}`, {
          path: bundlePath,
          details: { check: c.name },
        }),
      );
    return { ok: false, errors, report };
  }
  return { ok: true, receiptId, report, selfKeyed: trustedKeys === undefined };
}
