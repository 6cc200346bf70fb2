import path from "node:path";
import { JsonlFileLog } from "./audit/file-log.js";
import type { AppendOnlyLog } from "./audit/log.js";
import { AuditTrail } from "./audit/trail.js";
import { type Clock, systemClock } from "./core/clock.js";
import { Lifecycle } from "./core/lifecycle.js";
import { GateOrchestrator } from "./core/orchestrator.js";
import type { RetryPolicy } from "./core/retry.js";
import type { ReviewProvider } from "./core/review.js";
import { GateRegistry } from "./gates/registry.js";
import { MetricThresholdGate } from "./gates/metric-threshold-gate.js";
import { DiagnosticLog } from "./logging/diagnostics.js";
import { type Logger, createLogger } from "./logging/logger.js";
import { safePath } from "./logging/sanitize.js";
import { Batcher } from "./merkle/batcher.js";
import type { PolicyEngine } from "./policy/engine.js";
import { PolicyHistory } from "./policy/history.js";
import { loadPolicyFile } from "./policy/loader.js";
import { type SchemaRegistry, createSchemaRegistry } from "./schema/registry.js";
import { type RegisterEntityOptions, TrustLayer } from "./trust/layer.js";
import type { ProofgateConfig } from "./types/config.js";
import type { PolicyDocument } from "./types/policy.js";

export type RuntimeOptions = {
  /** Directory relative paths in the configuration resolve against. Defaults to cwd. */
  baseDir?: string;
  trust?: TrustLayer;
  /** Entities enrolled on the trust layer once the audit log has been replayed. */
  signers?: RegisterEntityOptions[];
  log?: AppendOnlyLog;
  registry?: GateRegistry;
  policy?: PolicyDocument;
  review?: ReviewProvider;
  logger?: Logger;
  clock?: Clock;
  schemas?: SchemaRegistry;
};

export type Runtime = {
  config: ProofgateConfig;
  logger: Logger;
  clock: Clock;
  schemas: SchemaRegistry;
  trust: TrustLayer;
  registry: GateRegistry;
  policies: PolicyHistory;
  policy: PolicyEngine;
  batcher: Batcher;
  trail: AuditTrail;
  diagnostics: DiagnosticLog;
  orchestrator: GateOrchestrator;
  openLifecycle(id: string, rootSecret: Uint8Array | string, opts?: { nonce?: string }): Lifecycle;
};

export function signingRetry(config: ProofgateConfig): RetryPolicy {
  return {
    attempts: config.signing.retry_attempts,
    baseDelayMs: config.signing.retry_base_delay_ms,
    maxDelayMs: config.signing.retry_max_delay_ms,
  };
}

/** Wire every component from a validated configuration and replay the audit log. */
export async function createRuntime(config: ProofgateConfig, opts: RuntimeOptions = {}): Promise<Runtime> {
  const baseDir = opts.baseDir ?? process.cwd();
  const clock = opts.clock ?? systemClock;
  const logger = opts.logger ?? createLogger({ level: config.logging.level, format: config.logging.format });
  const schemas = opts.schemas ?? createSchemaRegistry();
  const retry = signingRetry(config);

  const trust = opts.trust ?? new TrustLayer({ clock });

  const registry = opts.registry ?? new GateRegistry().register(new MetricThresholdGate());

  const policies = new PolicyHistory();
  const policy = policies.register(opts.policy ?? loadPolicyFile(path.resolve(baseDir, config.policy_file), schemas));
  logger.info("POLICY_LOADED", `Policy ${policy.ref.policy_id}@${policy.ref.version}`, { digest: policy.ref.digest });

  const batcher = new Batcher(trust, {
    window: { maxReceipts: config.batch.max_receipts, maxAgeMs: config.batch.max_age_ms },
    rootSigning: { required: config.batch.root_threshold, roles: config.batch.root_signer_roles },
    retry,
    clock,
    logger,
  });

  const auditDir = path.resolve(baseDir, config.audit_dir);
  const log = opts.log ?? new JsonlFileLog(safePath(auditDir, "trail.jsonl"));
  const trail = new AuditTrail({ log, trust, batcher, retry, logger, clock });
  await trail.load();
  // Signers recorded by an earlier process get a new key version here.
  for (const signer of opts.signers ?? []) await trust.enroll(signer);

  const diagnostics = new DiagnosticLog(logger, path.resolve(baseDir, config.logging.diagnostics_file));

  const orchestrator = new GateOrchestrator({
    trust,
    registry,
    trail,
    schemas,
    diagnostics,
    review: opts.review,
    logger,
    clock,
    settings: {
      defaultGateTimeoutMs: config.gates.default_timeout_ms,
      defaultReviewTimeoutMs: config.review.timeout_ms,
      receiptRole: config.signing.receipt_role,
      retry,
    },
  });

  return {
    config,
    logger,
    clock,
    schemas,
    trust,
    registry,
    policies,
    policy,
    batcher,
    trail,
    diagnostics,
    orchestrator,
    openLifecycle: (id, rootSecret, lifecycleOpts = {}) => Lifecycle.open(id, rootSecret, { clock, nonce: lifecycleOpts.nonce }),
  };
}
