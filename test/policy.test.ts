import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PolicyValidationError } from "../src/errors.js";
import { GateRegistry } from "../src/gates/registry.js";
import { PolicyEngine, aggregateStatus, policyDigest } from "../src/policy/engine.js";
import { PolicyHistory } from "../src/policy/history.js";
import { loadPolicyFile, parsePolicy } from "../src/policy/loader.js";
import type { PolicyDocument } from "../src/types/policy.js";
import { StaticGate } from "./helpers.js";

const DEFAULT_POLICY = path.resolve(import.meta.dirname, "../config/policies/default.yaml");

function layeredPolicy(): PolicyDocument {
  return {
    policy_id: "layered",
    version: "2.0.0",
    defaults: { fail_fast: true, gate_timeout_ms: 500, enforcement: { REVIEW: "block" } },
    stages: {
      model: {
        parallel: false,
        enforcement: { WARN: "allow" },
        gates: [
          { name: "a", enabled: true, thresholds: { score_min: 0.5 }, enforcement: { WARN: "escalate" }, timeout_ms: 50 },
          { name: "b", enabled: true },
          { name: "c", enabled: false },
        ],
      },
    },
  };
}

describe("parsePolicy", () => {
  it("accepts the shipped default policy", () => {
    const policy = loadPolicyFile(DEFAULT_POLICY);
    expect(policy.policy_id).toBe("default");
    expect(Object.keys(policy.stages)).toEqual(["dataset", "model", "training", "deployment", "inference"]);
  });

  it("rejects an unknown stage", () => {
    const raw = { policy_id: "p", version: "1", stages: { staging: { gates: [] } } };
    expect(() => parsePolicy(raw)).toThrow(/^Policy does not match schema: /);
  });

  it("rejects an unknown enforcement action", () => {
    const raw = { policy_id: "p", version: "1", stages: { model: { enforcement: { FAIL: "ignore" }, gates: [] } } };
    expect(() => parsePolicy(raw)).toThrow(PolicyValidationError);
  });

  it("rejects a gate listed twice for one stage", () => {
    const raw = {
      policy_id: "p",
      version: "1",
      stages: { model: { gates: [{ name: "a", enabled: true }, { name: "a", enabled: false }] } },
    };
    expect(() => parsePolicy(raw, undefined, "p.yaml")).toThrow('Gate "a" listed twice for stage model (p.yaml)');
  });
});

describe("loadPolicyFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "proofgate-policy-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads JSON policies", () => {
    const file = path.join(tmpDir, "layered.json");
    fs.writeFileSync(file, JSON.stringify(layeredPolicy()));
    expect(loadPolicyFile(file)).toEqual(layeredPolicy());
  });

  it("reports unparseable YAML with its path", () => {
    const file = path.join(tmpDir, "broken.yaml");
    fs.writeFileSync(file, "stages: [\n");
    expect(() => loadPolicyFile(file)).toThrow(/^Policy is not parseable: .* \(.*broken\.yaml\)$/s);
  });

  it("reports a missing file", () => {
    const file = path.join(tmpDir, "absent.yaml");
    expect(() => loadPolicyFile(file)).toThrow(`Policy file not found: ${file}`);
  });
});

describe("PolicyEngine", () => {
  it("layers enforcement from defaults to stage to gate", () => {
    const engine = PolicyEngine.fromDocument(layeredPolicy());

    expect(engine.enforcementFor("model", "a")).toEqual({ PASS: "allow", WARN: "escalate", REVIEW: "block", FAIL: "block" });
    expect(engine.enforcementFor("model", "b")).toEqual({ PASS: "allow", WARN: "allow", REVIEW: "block", FAIL: "block" });
    expect(engine.enforcementFor("dataset")).toEqual({ PASS: "allow", WARN: "warn", REVIEW: "block", FAIL: "block" });
  });

  it("picks the most severe action among the gates at the aggregate status", () => {
    const engine = PolicyEngine.fromDocument(layeredPolicy());

    expect(
      engine.decide("model", [
        { gate: "a", status: "WARN" },
        { gate: "b", status: "WARN" },
      ]),
    ).toEqual({ aggregate_status: "WARN", action: "escalate", triggered_by: ["a", "b"] });

    expect(
      engine.decide("model", [
        { gate: "a", status: "WARN" },
        { gate: "b", status: "FAIL" },
      ]),
    ).toEqual({ aggregate_status: "FAIL", action: "block", triggered_by: ["b"] });
  });

  it("treats no evaluated gates as PASS", () => {
    const engine = PolicyEngine.fromDocument(layeredPolicy());

    expect(engine.decide("model", [{ gate: "a", status: "SKIPPED" }])).toEqual({
      aggregate_status: "PASS",
      action: "allow",
      triggered_by: [],
    });
    expect(engine.decide("inference", [])).toEqual({ aggregate_status: "PASS", action: "allow", triggered_by: [] });
  });

  it("plans enabled gates in policy order against the registry", () => {
    const engine = PolicyEngine.fromDocument(layeredPolicy());
    const a = new StaticGate("a", "PASS");
    const registry = new GateRegistry().register(a, ["model"]);

    const plan = engine.plan("model", registry);
    expect(plan.failFast).toBe(true);
    expect(plan.parallel).toBe(false);
    expect(plan.gateTimeoutMs).toBe(500);
    expect(plan.gates.map((g) => g.name)).toEqual(["a", "b"]);
    expect(plan.gates[0].gate).toBe(a);
    expect(plan.gates[0].thresholds).toEqual({ score_min: 0.5 });
    expect(plan.gates[0].timeoutMs).toBe(50);
    expect(plan.gates[1].gate).toBeNull();
    expect(engine.plan("model", registry)).toEqual(plan);
  });

  it("does not plan a gate registered for other stages only", () => {
    const engine = PolicyEngine.fromDocument(layeredPolicy());
    const registry = new GateRegistry().register(new StaticGate("a", "PASS"), ["dataset"]);
    expect(engine.plan("model", registry).gates[0].gate).toBeNull();
  });

  it("freezes its document", () => {
    const doc = layeredPolicy();
    const engine = PolicyEngine.fromDocument(doc);
    doc.version = "9.9.9";

    expect(engine.ref.version).toBe("2.0.0");
    expect(Object.isFrozen(engine.document.stages)).toBe(true);
  });

  it("digests policies independently of key order", () => {
    const doc = layeredPolicy();
    const reordered: PolicyDocument = { stages: doc.stages, version: doc.version, defaults: doc.defaults, policy_id: doc.policy_id };
    expect(policyDigest(reordered)).toBe(policyDigest(doc));
    expect(policyDigest({ ...doc, version: "2.0.1" })).not.toBe(policyDigest(doc));
  });
});

describe("aggregateStatus", () => {
  it("ranks FAIL over REVIEW over WARN over PASS", () => {
    expect(aggregateStatus(["PASS", "WARN"])).toBe("WARN");
    expect(aggregateStatus(["WARN", "REVIEW", "PASS"])).toBe("REVIEW");
    expect(aggregateStatus(["REVIEW", "FAIL", "SKIPPED"])).toBe("FAIL");
    expect(aggregateStatus([])).toBe("PASS");
  });
});

describe("PolicyHistory", () => {
  it("keeps every registered version", () => {
    const history = new PolicyHistory();
    const v2 = history.register(layeredPolicy());
    const v3 = history.register({ ...layeredPolicy(), version: "3.0.0" });

    expect(history.get("layered", "2.0.0")).toBe(v2);
    expect(history.get("layered", "3.0.0")).toBe(v3);
    expect(history.refs().map((r) => r.version)).toEqual(["2.0.0", "3.0.0"]);
  });

  it("accepts identical re-registration and rejects changed content", () => {
    const history = new PolicyHistory();
    const first = history.register(layeredPolicy());

    expect(history.register(layeredPolicy())).toBe(first);
    expect(() => history.register({ ...layeredPolicy(), description: "changed" })).toThrow(
      "Policy layered@2.0.0 already registered with different content",
    );
  });

  it("resolves a reference only when the digest matches", () => {
    const history = new PolicyHistory();
    const engine = history.register(layeredPolicy());

    expect(history.resolve(engine.ref)).toBe(engine);
    expect(history.resolve({ ...engine.ref, digest: "0".repeat(64) })).toBeUndefined();
  });
});
