import path from "node:path";
import { MetricThresholdGate } from "../gates/metric-threshold-gate.js";
import { GateRegistry } from "../gates/registry.js";
import { PolicyEngine } from "../policy/engine.js";
import { loadPolicyFile } from "../policy/loader.js";
import { createSchemaRegistry } from "../schema/registry.js";
import type { EnforcementMap, PolicyRef } from "../types/policy.js";
import { STAGES, type Stage, isStage } from "../types/stage.js";
import { type Diagnostic, describeError, diag } from "./diagnostic.js";

export type PlannedGateView = {
  name: string;
  registered: boolean;
  thresholds: Record<string, number>;
  enforcement: EnforcementMap;
  timeout_ms: number | null;
};

export type StagePlanView = {
  stage: Stage;
  fail_fast: boolean;
  parallel: boolean;
  gates: PlannedGateView[];
};

export type PolicyPlanResult =
  | { ok: true; policy: PolicyRef; stages: StagePlanView[] }
  | { ok: false; errors: Diagnostic[] };

/**
 * Show what a policy would run per stage against the built-in gate catalog.
 * Gates the catalog lacks are listed as unregistered; at run time they yield REVIEW.
 */
export function planPolicy(opts: { policyPath: string; stage?: string; schemaDir?: string }): PolicyPlanResult {
  if (opts.stage !== undefined && !isStage(opts.stage)) {
    return { ok: false, errors: [diag("error", "INVALID_ARGS", `Unknown stage: ${opts.stage}`)] };
  }
  const stages = opts.stage !== undefined && isStage(opts.stage) ? [opts.stage] : [...STAGES];
  const policyPath = path.resolve(opts.policyPath);

  let engine: PolicyEngine;
  try {
    engine = PolicyEngine.fromDocument(loadPolicyFile(policyPath, createSchemaRegistry(opts.schemaDir)));
  } catch (e) {
    return { ok: false, errors: [diag("error", "POLICY_INVALID", describeError(e), { path: policyPath })] };
  }

  const registry = new GateRegistry().register(new MetricThresholdGate());
  return {
    ok: true,
    policy: { ...engine.ref },
    stages: stages.map((stage) => {
      const plan = engine.plan(stage, registry);
      return {
        stage,
        fail_fast: plan.failFast,
        parallel: plan.parallel,
        gates: plan.gates.map((g) => ({
          name: g.name,
          registered: g.gate !== null,
          thresholds: g.thresholds,
          enforcement: g.enforcement,
          timeout_ms: g.timeoutMs ?? plan.gateTimeoutMs ?? null,
        })),
      };
    }),
  };
}
