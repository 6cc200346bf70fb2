import { AnchorChain } from "../anchor/chain.js";
import type { Stage } from "../types/stage.js";
import { type Clock, LifecycleStamper, systemClock } from "./clock.js";

/**
 * One lifecycle instance: its anchor chain, its timestamp sequence and the
 * operations a block has halted. Owned by a single orchestrator.
 */
export class Lifecycle {
  readonly stamper: LifecycleStamper;
  private readonly halted = new Map<string, Stage>();

  private constructor(readonly id: string, readonly chain: AnchorChain, clock: Clock) {
    this.stamper = new LifecycleStamper(clock);
  }

  static open(id: string, rootSecret: Uint8Array | string, opts: { clock?: Clock; nonce?: string } = {}): Lifecycle {
    return new Lifecycle(id, AnchorChain.open(id, rootSecret, { nonce: opts.nonce }), opts.clock ?? systemClock);
  }

  halt(operationId: string, stage: Stage): void {
    if (!this.halted.has(operationId)) this.halted.set(operationId, stage);
  }

  haltedAt(operationId: string): Stage | undefined {
    return this.halted.get(operationId);
  }
}
