import { AuditTrail } from "../src/audit/trail.js";
import { type LogEntry, MemoryLog } from "../src/audit/log.js";
import type { Clock } from "../src/core/clock.js";
import { Lifecycle } from "../src/core/lifecycle.js";
import { GateOrchestrator } from "../src/core/orchestrator.js";
import type { RetryPolicy } from "../src/core/retry.js";
import type { ReviewProvider } from "../src/core/review.js";
import { sha256Hex } from "../src/crypto/hash.js";
import { StorageUnavailableError } from "../src/errors.js";
import { GateRegistry } from "../src/gates/registry.js";
import { DiagnosticLog } from "../src/logging/diagnostics.js";
import { createLogger, silentLogger } from "../src/logging/logger.js";
import { Batcher } from "../src/merkle/batcher.js";
import type { SealInput } from "../src/receipt/generator.js";
import { createSchemaRegistry } from "../src/schema/registry.js";
import { type SigningBackend, LocalKeyBackend } from "../src/trust/backend.js";
import { TrustLayer } from "../src/trust/layer.js";
import type { Gate, GateContext, GateStatus, GateVerdict, OperationContext } from "../src/types/gate.js";
import type { JsonObject } from "../src/types/json.js";
import type { ReceiptKind } from "../src/types/receipt.js";
import type { Stage } from "../src/types/stage.js";

export const T0 = Date.parse("2026-03-01T00:00:00.000Z");

/** Placeholder root secret, long enough for anchor derivation. */
export const ROOT_SECRET = "test-secret-for-anchor-derivation-only";

export const FAST_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

/** Wall time only moves when told to; every monotonic read advances 1µs. */
export class ManualClock implements Clock {
  private mono = 0n;

  constructor(private ms: number = T0) {}

  now(): number {
    return this.ms;
  }

  monotonic(): bigint {
    this.mono += 1000n;
    return this.mono;
  }

  advance(ms: number): void {
    this.ms += ms;
  }

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }
}

/** Backend that fails the next `n` signing calls, then delegates. */
export class FlakyBackend implements SigningBackend {
  private readonly inner = new LocalKeyBackend();
  signCalls = 0;

  constructor(public failuresLeft = 0) {}

  generateKey(keyId: string): Promise<{ publicKeyPem: string }> {
    return this.inner.generateKey(keyId);
  }

  async sign(keyId: string, message: Buffer): Promise<Buffer> {
    this.signCalls++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("backend unavailable");
    }
    return this.inner.sign(keyId, message);
  }
}

/** Memory log that refuses entries of the given kinds as if storage were full. */
export class UnwritableLog extends MemoryLog {
  constructor(private readonly refused: ReadonlySet<LogEntry["kind"]>) {
    super();
  }

  async append(entry: LogEntry): Promise<boolean> {
    if (this.refused.has(entry.kind)) throw new StorageUnavailableError("disk full");
    return super.append(entry);
  }
}

export async function kindsOf(log: MemoryLog): Promise<string[]> {
  const kinds: string[] = [];
  for await (const entry of log.read()) kinds.push(entry.kind);
  return kinds;
}

export function digestOf(label: string): string {
  return sha256Hex(label);
}

/** Gate that always answers `status`, optionally after a delay. */
export class StaticGate implements Gate {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly status: GateStatus,
    private readonly opts: { delayMs?: number; recommendations?: string[] } = {},
  ) {}

  async evaluate(ctx: GateContext): Promise<GateVerdict> {
    this.calls++;
    if (this.opts.delayMs) await new Promise((resolve) => setTimeout(resolve, this.opts.delayMs));
    return {
      gate: this.name,
      stage: ctx.stage,
      status: this.status,
      metrics: { score: this.status === "PASS" ? 1 : 0 },
      recommendations: this.opts.recommendations ?? [],
      evidence_digest: sha256Hex(`${this.name}:${ctx.operation_id}:${this.status}`),
    };
  }
}

export function throwingGate(name: string, message: string): Gate {
  return {
    name,
    evaluate(): GateVerdict {
      throw new Error(message);
    },
  };
}

export function context(stage: Stage, opts: { lifecycleId?: string; operationId?: string; metadata?: JsonObject } = {}): OperationContext {
  return {
    lifecycle_id: opts.lifecycleId ?? "lc-1",
    operation_id: opts.operationId ?? "op-1",
    stage,
    metadata: opts.metadata ?? {},
    evidence: [{ name: `${stage}-evidence`, digest: digestOf(`${stage}-evidence`) }],
  };
}

/** Seal input for a passing receipt signed by the platform operator. */
export function receiptInput(operationId: string, stage: Stage, wall: string, kind: ReceiptKind = "gate"): SealInput {
  return {
    kind,
    lifecycle_id: "lc-1",
    operation_id: operationId,
    stage,
    anchor_id: digestOf(`anchor:${stage}`),
    evidence_digest: digestOf(`evidence:${operationId}:${stage}`),
    policy: { policy_id: "test-policy", version: "1.0.0", digest: digestOf("policy") },
    timestamp: { wall, mono: String(Date.parse(wall)) },
    verdicts: [],
    aggregate_status: "PASS",
    enforcement_action: "allow",
    outcome: "proceeded",
    signer: { role: "platform_operator" },
  };
}

export async function trustWithSigners(clock: Clock, backend?: SigningBackend): Promise<TrustLayer> {
  const trust = new TrustLayer({ clock, backend });
  await trust.registerEntity({ entityId: "operator-1", role: "platform_operator" });
  await trust.registerEntity({ entityId: "auditor-1", role: "auditor" });
  await trust.registerEntity({ entityId: "reviewer-1", role: "model_owner" });
  return trust;
}

export type Harness = {
  clock: ManualClock;
  trust: TrustLayer;
  registry: GateRegistry;
  log: MemoryLog;
  batcher: Batcher;
  trail: AuditTrail;
  diagnostics: DiagnosticLog;
  orchestrator: GateOrchestrator;
  lifecycle: Lifecycle;
};

export async function harness(
  opts: {
    gates?: Gate[];
    review?: ReviewProvider;
    reviewTimeoutMs?: number;
    backend?: SigningBackend;
    maxReceipts?: number;
    log?: MemoryLog;
    /** Collects JSON log lines from the orchestrator. */
    lines?: string[];
  } = {},
): Promise<Harness> {
  const clock = new ManualClock();
  const trust = await trustWithSigners(clock, opts.backend);
  const registry = new GateRegistry();
  for (const gate of opts.gates ?? []) registry.register(gate);

  const log = opts.log ?? new MemoryLog();
  const batcher = new Batcher(trust, {
    window: { maxReceipts: opts.maxReceipts ?? 100, maxAgeMs: 60_000 },
    rootSigning: { required: 2, roles: ["platform_operator", "auditor"] },
    retry: FAST_RETRY,
    clock,
  });
  const trail = new AuditTrail({ log, trust, batcher, retry: FAST_RETRY, clock });
  const diagnostics = new DiagnosticLog(silentLogger, null);
  const lines = opts.lines;
  const orchestrator = new GateOrchestrator({
    trust,
    registry,
    trail,
    schemas: createSchemaRegistry(),
    diagnostics,
    review: opts.review,
    logger: lines ? createLogger({ level: "debug", write: (line) => lines.push(line) }) : undefined,
    clock,
    settings: {
      defaultGateTimeoutMs: 1_000,
      defaultReviewTimeoutMs: opts.reviewTimeoutMs ?? 1_000,
      receiptRole: "platform_operator",
      retry: FAST_RETRY,
    },
  });
  const lifecycle = Lifecycle.open("lc-1", ROOT_SECRET, { clock, nonce: "00112233445566778899aabbccddeeff" });
  return { clock, trust, registry, log, batcher, trail, diagnostics, orchestrator, lifecycle };
}
