import { canonicalJson, sha256Hex } from "../crypto/hash.js";
import type { Gate, GateContext, GateStatus, GateVerdict } from "../types/gate.js";
import { isJsonObject } from "../types/json.js";
import { aggregateStatus } from "../policy/engine.js";

export type MetricViolation = {
  metric: string;
  bound: "min" | "max";
  threshold: number;
  actual: number;
};

export type MetricThresholdOptions = {
  /** Metadata key holding the metrics mapping. */
  metricsKey?: string;
};

/**
 * Reference gate comparing reported metrics against policy thresholds.
 * A threshold named `<metric>_min` requires actual >= threshold and
 * `<metric>_max` requires actual <= threshold. Setting `parameters.warn_margin`
 * turns values within that distance of a bound into WARN. A metric the
 * thresholds name but the context lacks yields REVIEW.
 */
export class MetricThresholdGate implements Gate {
  readonly version = "1";
  private readonly metricsKey: string;

  constructor(readonly name: string = "metric_threshold", opts: MetricThresholdOptions = {}) {
    this.metricsKey = opts.metricsKey ?? "metrics";
  }

  evaluate(ctx: GateContext): GateVerdict {
    const source = ctx.metadata[this.metricsKey];
    const reported = isJsonObject(source) ? source : {};
    const margin = typeof ctx.parameters.warn_margin === "number" ? ctx.parameters.warn_margin : 0;

    const statuses: GateStatus[] = [];
    const violations: MetricViolation[] = [];
    const missing: string[] = [];
    const near: string[] = [];
    const observed: Record<string, number> = {};

    for (const [key, threshold] of Object.entries(ctx.thresholds)) {
      const m = /^(.+)_(min|max)$/.exec(key);
      if (!m) continue;
      const metric = m[1];
      const bound = m[2] === "min" ? "min" : "max";
      const actual = reported[metric];
      if (typeof actual !== "number") {
        missing.push(metric);
        statuses.push("REVIEW");
        continue;
      }
      observed[metric] = actual;

      const slack = bound === "min" ? actual - threshold : threshold - actual;
      if (slack < 0) {
        violations.push({ metric, bound, threshold, actual });
        statuses.push("FAIL");
      } else if (slack < margin) {
        near.push(metric);
        statuses.push("WARN");
      } else {
        statuses.push("PASS");
      }
    }

    const recommendations = [
      ...violations.map((v) => `${v.metric}=${v.actual} violates ${v.bound} bound ${v.threshold}`),
      ...near.map((metric) => `${metric} is within ${margin} of its bound`),
      ...missing.map((metric) => `metric ${metric} was not reported`),
    ];

    return {
      gate: this.name,
      stage: ctx.stage,
      status: aggregateStatus(statuses),
      metrics: { ...observed, violations: violations.length, missing: missing.length },
      recommendations,
      evidence_digest: sha256Hex(
        canonicalJson({ gate: this.name, stage: ctx.stage, observed, thresholds: ctx.thresholds, evidence: ctx.evidence }),
      ),
    };
  }
}
