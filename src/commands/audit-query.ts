import fs from "node:fs";
import path from "node:path";
import { JsonlFileLog } from "../audit/file-log.js";
import { type ReceiptFilter, ReceiptQuery } from "../audit/trail.js";
import type { Receipt } from "../types/receipt.js";
import { isStage } from "../types/stage.js";
import { type Diagnostic, describeError, diag } from "./diagnostic.js";

export type AuditQueryOptions = {
  trailPath: string;
  operation?: string;
  lifecycle?: string;
  stage?: string;
  kind?: string;
  from?: string;
  to?: string;
};

export type AuditQueryResult = { ok: true; receipts: Receipt[] } | { ok: false; errors: Diagnostic[] };

function isoBound(name: string, value: string | undefined, errors: Diagnostic[]): string | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    errors.push(diag("error", "INVALID_ARGS", `--${name} is not a date: ${value}`));
    return undefined;
  }
  return new Date(ms).toISOString();
}

/** Read receipts matching the filter from a JSON-lines audit trail, in append order. */
export async function queryAudit(opts: AuditQueryOptions): Promise<AuditQueryResult> {
  const errors: Diagnostic[] = [];
  const filter: ReceiptFilter = { operation_id: opts.operation, lifecycle_id: opts.lifecycle };

  if (opts.stage !== undefined) {
    if (isStage(opts.stage)) filter.stage = opts.stage;
    else errors.push(diag("error", "INVALID_ARGS", `Unknown stage: ${opts.stage}`));
  }
  if (opts.kind !== undefined) {
    if (opts.kind === "gate" || opts.kind === "review") filter.kind = opts.kind;
    else errors.push(diag("error", "INVALID_ARGS", `Unknown receipt kind: ${opts.kind}`));
  }
  filter.from = isoBound("from", opts.from, errors);
  filter.to = isoBound("to", opts.to, errors);
  if (errors.length > 0) return { ok: false, errors };

  const trailPath = path.resolve(opts.trailPath);
  if (!fs.existsSync(trailPath)) {
    return { ok: false, errors: [diag("error", "TRAIL_MISSING", `Audit trail not found: ${trailPath}`, { path: trailPath })] };
  }

  try {
    const receipts = await new ReceiptQuery(new JsonlFileLog(trailPath), filter).toArray();
    return { ok: true, receipts };
  } catch (e) {
    return { ok: false, errors: [diag("error", "TRAIL_READ_FAILED", describeError(e), { path: trailPath })] };
  }
}
