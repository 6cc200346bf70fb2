#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { queryAudit } from "./commands/audit-query.js";
import type { Diagnostic } from "./commands/diagnostic.js";
import { EXIT } from "./commands/exit-codes.js";
import { planPolicy } from "./commands/policy-plan.js";
import { validateAll } from "./commands/validate.js";
import { verifyBundleFile } from "./commands/verify.js";

type Format = "human" | "jsonl";

function parseFormat(value: string): Format {
  if (value !== "human" && value !== "jsonl") throw new InvalidArgumentError("Expected human or jsonl.");
  return value;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || String(n) !== value.trim()) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function line(record: unknown): void {
  process.stdout.write(JSON.stringify(record) + "\n");
}

function fail(format: Format, errors: Diagnostic[], exit: number): never {
  if (format === "jsonl") {
    for (const err of errors) line(err);
  } else {
    for (const err of errors) console.error(err.message);
  }
  process.exit(exit);
}

const program = new Command();

program.name("proofgate").description("Stage gates, signed receipts and offline-verifiable audit trails").version("0.1.0");

program
  .command("validate")
  .description("Validate configuration layers and policy files")
  .option("--config <path>", "Path to config directory", "config")
  .option("--policy <paths...>", "Additional policy files to validate")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (opts: { config: string; policy?: string[]; format: Format }) => {
    const res = await validateAll({ configDir: opts.config, policyFiles: opts.policy });
    if (!res.ok) fail(opts.format, res.errors, EXIT.CHECK_FAILED);

    if (opts.format === "jsonl") {
      line({ level: "info", code: "OK", message: "OK", checked: res.checked });
    } else {
      console.log(`OK (${res.checked.length} file(s) checked)`);
    }
  });

const policy = program.command("policy").description("Inspect stage gate policies");

policy
  .command("plan")
  .description("Show the gates, thresholds and enforcement each stage would run")
  .option("--policy <path>", "Policy file", "config/policies/default.yaml")
  .option("--stage <stage>", "Only this stage")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((opts: { policy: string; stage?: string; format: Format }) => {
    const res = planPolicy({ policyPath: opts.policy, stage: opts.stage });
    if (!res.ok) fail(opts.format, res.errors, EXIT.INVALID_ARGS);

    if (opts.format === "jsonl") {
      for (const stage of res.stages) line({ policy: res.policy, ...stage });
      return;
    }
    console.log(`${res.policy.policy_id}@${res.policy.version} sha256:${res.policy.digest}`);
    for (const stage of res.stages) {
      const mode = `${stage.parallel ? "parallel" : "sequential"}${stage.fail_fast ? ", fail-fast" : ""}`;
      console.log(`${stage.stage} (${mode})`);
      if (stage.gates.length === 0) console.log("  (no gates)");
      for (const g of stage.gates) {
        const thresholds = Object.entries(g.thresholds)
          .map(([k, v]) => `${k}=${v}`)
          .join(" ");
        const actions = Object.entries(g.enforcement)
          .map(([s, a]) => `${s}:${a}`)
          .join(" ");
        console.log(`  ${g.name}${g.registered ? "" : " [unregistered]"}  ${thresholds}  ${actions}`);
      }
    }
  });

const audit = program.command("audit").description("Read the audit trail");

audit
  .command("query")
  .description("List receipts matching a filter, in append order")
  .option("--trail <path>", "Audit trail file", "audit/trail.jsonl")
  .option("--operation <id>", "Operation id")
  .option("--lifecycle <id>", "Lifecycle id")
  .option("--stage <stage>", "Stage")
  .option("--kind <kind>", "Receipt kind: gate|review")
  .option("--from <time>", "Earliest timestamp (inclusive)")
  .option("--to <time>", "Latest timestamp (exclusive)")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (opts: {
      trail: string;
      operation?: string;
      lifecycle?: string;
      stage?: string;
      kind?: string;
      from?: string;
      to?: string;
      format: Format;
    }) => {
      const res = await queryAudit({ trailPath: opts.trail, ...opts });
      if (!res.ok) fail(opts.format, res.errors, EXIT.INVALID_ARGS);

      if (opts.format === "jsonl") {
        for (const r of res.receipts) line(r);
        return;
      }
      if (res.receipts.length === 0) {
        console.log("No receipts found.");
        return;
      }
      for (const r of res.receipts) {
        console.log(`${r.timestamp.wall}  ${r.receipt_id}  ${r.kind}  ${r.operation_id}  ${r.stage}  ${r.aggregate_status}  ${r.outcome}`);
      }
    },
  );

program
  .command("verify")
  .description("Verify an exported proof bundle offline")
  .argument("<bundle>", "Proof bundle JSON file")
  .option("--keys <path>", "Trusted keys JSON file (default: keys embedded in the bundle)")
  .option("--min-threshold <n>", "Minimum root signatures required", parsePositiveInt)
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action((bundle: string, opts: { keys?: string; minThreshold?: number; format: Format }) => {
    const res = verifyBundleFile({ bundlePath: bundle, keysPath: opts.keys, minThreshold: opts.minThreshold });
    if (!res.ok) fail(opts.format, res.errors, EXIT.CHECK_FAILED);

    if (opts.format === "jsonl") {
      for (const check of res.report.checks) line({ level: "info", code: "CHECK_PASSED", ...check });
      line({ level: "info", code: "OK", receipt_id: res.receiptId, self_keyed: res.selfKeyed });
      return;
    }
    for (const check of res.report.checks) console.log(`ok  ${check.name}${check.detail ? `  ${check.detail}` : ""}`);
    console.log(`Receipt ${res.receiptId} verified.`);
    if (res.selfKeyed) console.warn("Checked against keys embedded in the bundle; pass --keys to establish who signed.");
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INTERNAL_ERROR);
});
