import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonlFileLog } from "../src/audit/file-log.js";
import { AuditTrail } from "../src/audit/trail.js";
import { queryAudit } from "../src/commands/audit-query.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { planPolicy } from "../src/commands/policy-plan.js";
import { verifyBundleFile } from "../src/commands/verify.js";
import { ReceiptGenerator } from "../src/receipt/generator.js";
import { TrustLayer } from "../src/trust/layer.js";
import { FAST_RETRY, ManualClock, harness, receiptInput } from "./helpers.js";

const DEFAULT_POLICY = path.resolve(import.meta.dirname, "../config/policies/default.yaml");

describe("exit-codes", () => {
  it("defines all required exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.CHECK_FAILED).toBe(1);
    expect(EXIT.INVALID_ARGS).toBe(2);
    expect(EXIT.INTERNAL_ERROR).toBe(3);
  });
});

describe("verify", () => {
  let tmpDir: string;
  let bundlePath: string;
  let keysPath: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "proofgate-verify-"));
    const h = await harness();
    await h.trail.append(await new ReceiptGenerator(h.trust).seal(receiptInput("op-1", "model", "2026-03-01T00:00:00.000Z")));
    const bundle = await h.trail.exportProofBundle("op-1");
    bundlePath = path.join(tmpDir, "bundle.json");
    keysPath = path.join(tmpDir, "keys.json");
    fs.writeFileSync(bundlePath, JSON.stringify(bundle, null, 2));
    fs.writeFileSync(keysPath, JSON.stringify(h.trust.trustedKeys()));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("verifies against the bundle's own keys", () => {
    const res = verifyBundleFile({ bundlePath });
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.selfKeyed).toBe(true);
      expect(res.report.checks.every((c) => c.ok)).toBe(true);
    }
  });

  it("verifies against a trusted keys file", () => {
    const res = verifyBundleFile({ bundlePath, keysPath });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.selfKeyed).toBe(false);
  });

  it("lists each failed check", async () => {
    const other = new TrustLayer({ clock: new ManualClock() });
    await other.registerEntity({ entityId: "operator-1", role: "platform_operator" });
    await other.registerEntity({ entityId: "auditor-1", role: "auditor" });
    fs.writeFileSync(keysPath, JSON.stringify(other.trustedKeys()));

    const res = verifyBundleFile({ bundlePath, keysPath });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.message)).toEqual([
        "Check failed: receipt_signature",
        "Check failed: batch_threshold (0 valid root signature(s), 2 required)",
      ]);
      expect(res.errors.every((e) => e.code === "BUNDLE_CHECK_FAILED")).toBe(true);
    }
  });

  it("applies a minimum signature threshold", () => {
    const res = verifyBundleFile({ bundlePath, minThreshold: 3 });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.message)).toEqual(["Check failed: batch_threshold (2 valid root signature(s), 3 required)"]);
  });

  it("reports a missing bundle", () => {
    const res = verifyBundleFile({ bundlePath: path.join(tmpDir, "absent.json") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("BUNDLE_MISSING");
  });

  it("reports a bundle that is not JSON", () => {
    fs.writeFileSync(bundlePath, "{");
    const res = verifyBundleFile({ bundlePath });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("BUNDLE_JSON_INVALID");
  });

  it("reports a bundle that does not match the schema", () => {
    fs.writeFileSync(bundlePath, JSON.stringify({ format: "proofgate.proof-bundle/1" }));
    const res = verifyBundleFile({ bundlePath });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors[0].code).toBe("BUNDLE_INVALID");
      expect(res.errors[0].message).toMatch(/^Malformed proof bundle: /);
    }
  });

  it("reports a malformed keys file", () => {
    fs.writeFileSync(keysPath, JSON.stringify({ keys: [] }));
    const res = verifyBundleFile({ bundlePath, keysPath });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("KEYS_INVALID");
  });
});

describe("audit query", () => {
  let tmpDir: string;
  let trailPath: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "proofgate-audit-"));
    trailPath = path.join(tmpDir, "trail.jsonl");
    const h = await harness();
    const trail = new AuditTrail({ log: new JsonlFileLog(trailPath), trust: h.trust, batcher: h.batcher, retry: FAST_RETRY });
    const generator = new ReceiptGenerator(h.trust);
    await trail.append(await generator.seal(receiptInput("op-1", "dataset", "2026-03-01T00:00:00.000Z")));
    await trail.append(await generator.seal(receiptInput("op-1", "model", "2026-03-01T00:00:01.000Z")));
    await trail.append(await generator.seal(receiptInput("op-2", "dataset", "2026-03-01T00:00:02.000Z", "review")));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns every receipt in append order", async () => {
    const res = await queryAudit({ trailPath });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.receipts.map((r) => `${r.operation_id}/${r.stage}`)).toEqual(["op-1/dataset", "op-1/model", "op-2/dataset"]);
  });

  it("filters by stage and kind", async () => {
    const res = await queryAudit({ trailPath, stage: "dataset", kind: "gate" });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.receipts.map((r) => r.operation_id)).toEqual(["op-1"]);
  });

  it("normalizes time bounds", async () => {
    const res = await queryAudit({ trailPath, from: "2026-03-01T00:00:01Z", to: "2026-03-01T01:00:03+01:00" });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.receipts.map((r) => r.stage)).toEqual(["model", "dataset"]);
  });

  it("rejects an unknown stage, kind or date", async () => {
    const res = await queryAudit({ trailPath, stage: "staging", kind: "note", from: "yesterday" });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.message)).toEqual([
        "Unknown stage: staging",
        "Unknown receipt kind: note",
        "--from is not a date: yesterday",
      ]);
    }
  });

  it("reports a missing trail", async () => {
    const res = await queryAudit({ trailPath: path.join(tmpDir, "absent.jsonl") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("TRAIL_MISSING");
  });

  it("reports a corrupt trail", async () => {
    fs.writeFileSync(trailPath, "not json\n");
    const res = await queryAudit({ trailPath });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors[0].code).toBe("TRAIL_READ_FAILED");
      expect(res.errors[0].message).toBe(`Unparseable entry at ${trailPath}:1`);
    }
  });
});

describe("policy plan", () => {
  it("plans every stage of the default policy", () => {
    const res = planPolicy({ policyPath: DEFAULT_POLICY });
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.policy.policy_id).toBe("default");
      expect(res.stages.map((s) => s.stage)).toEqual(["dataset", "model", "training", "deployment", "inference"]);
      expect(res.stages.every((s) => s.gates.every((g) => g.registered))).toBe(true);
    }
  });

  it("shows stage settings and layered enforcement", () => {
    const res = planPolicy({ policyPath: DEFAULT_POLICY, stage: "deployment" });
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.stages).toEqual([
        {
          stage: "deployment",
          fail_fast: true,
          parallel: true,
          gates: [
            {
              name: "metric_threshold",
              registered: true,
              thresholds: { accuracy_min: 0.9, latency_p99_ms_max: 250 },
              enforcement: { PASS: "allow", WARN: "escalate", REVIEW: "escalate", FAIL: "block" },
              timeout_ms: 10000,
            },
          ],
        },
      ]);
    }
  });

  it("marks gates without an implementation", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "proofgate-plan-"));
    try {
      const policyPath = path.join(tmpDir, "custom.yaml");
      fs.writeFileSync(policyPath, "policy_id: custom\nversion: '1'\nstages:\n  model:\n    gates:\n      - name: bias_audit\n        enabled: true\n");
      const res = planPolicy({ policyPath, stage: "model" });
      expect(res.ok).toBe(true);
      if (res.ok) {
        expect(res.stages[0].gates.map((g) => [g.name, g.registered, g.timeout_ms])).toEqual([["bias_audit", false, null]]);
      }
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("rejects an unknown stage", () => {
    const res = planPolicy({ policyPath: DEFAULT_POLICY, stage: "staging" });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("INVALID_ARGS");
  });

  it("reports an unreadable policy", () => {
    const res = planPolicy({ policyPath: path.join(os.tmpdir(), "proofgate-absent-policy.yaml") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("POLICY_INVALID");
  });
});
