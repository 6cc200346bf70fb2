export * from "./errors.js";

export type { JsonObject, JsonValue } from "./types/json.js";
export * from "./types/stage.js";
export * from "./types/gate.js";
export * from "./types/policy.js";
export * from "./types/trust.js";
export * from "./types/receipt.js";
export * from "./types/merkle.js";
export * from "./types/bundle.js";
export * from "./types/config.js";

export { sha256Hex, canonicalJson, evidenceDigest } from "./crypto/hash.js";

export { type Anchor, type AnchorInfo, AnchorChain, deriveAnchor, publicAnchor, rootAnchor, verifyAnchorChain } from "./anchor/chain.js";

export { type SigningBackend, LocalKeyBackend } from "./trust/backend.js";
export { TrustLayer, type RegisterEntityOptions, type RotateKeyOptions, type ThresholdOptions } from "./trust/layer.js";
export { verifySignature, verifyWithKeys } from "./trust/signature.js";

export { RECEIPT_FORMAT, encodeReceipt, receiptBody, receiptDigest } from "./receipt/canonical.js";
export { ReceiptGenerator, type SealInput, verifyReceipt } from "./receipt/generator.js";

export { EMPTY_NODE, buildProof, merkleRoot, verifyInclusion } from "./merkle/tree.js";
export { Batcher, type BatcherOptions, batchRootDigest } from "./merkle/batcher.js";

export { GateRegistry } from "./gates/registry.js";
export { MetricThresholdGate } from "./gates/metric-threshold-gate.js";
export { type Decision, PolicyEngine, type StagePlan, aggregateStatus, policyDigest } from "./policy/engine.js";
export { PolicyHistory } from "./policy/history.js";
export { loadPolicyFile, parsePolicy } from "./policy/loader.js";

export { type Clock, systemClock } from "./core/clock.js";
export { DEFAULT_RETRY, type RetryPolicy, withRetry } from "./core/retry.js";
export { type RunState, RUN_STATES, nextState } from "./core/state-machine.js";
export { type GateResult } from "./core/gate-runner.js";
export { type ReviewProvider, type ReviewRequest, type ReviewResponse, ReviewQueue } from "./core/review.js";
export { Lifecycle } from "./core/lifecycle.js";
export { GateOrchestrator, type OrchestratorSettings, type StageRun } from "./core/orchestrator.js";
export { type LifecycleRun, runLifecycle } from "./core/pipeline.js";

export { type AppendOnlyLog, type LogEntry, MemoryLog, receiptsOf } from "./audit/log.js";
export { JsonlFileLog } from "./audit/file-log.js";
export { AuditTrail, type ReceiptFilter, ReceiptQuery } from "./audit/trail.js";
export { type BundleReport, assertProofBundle, parseProofBundle, parseTrustedKeys, verifyProofBundle } from "./audit/verify-bundle.js";

export { type Logger, createLogger, silentLogger } from "./logging/logger.js";
export { DiagnosticLog } from "./logging/diagnostics.js";
export { SchemaRegistry, createSchemaRegistry } from "./schema/registry.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { type Runtime, type RuntimeOptions, createRuntime } from "./runtime.js";
