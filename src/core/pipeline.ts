import { PolicyViolationError } from "../errors.js";
import type { PolicyEngine } from "../policy/engine.js";
import type { OperationContext } from "../types/gate.js";
import { type Stage, stageIndex } from "../types/stage.js";
import type { Lifecycle } from "./lifecycle.js";
import type { GateOrchestrator, StageRun } from "./orchestrator.js";

export type LifecycleRun = {
  completed: StageRun[];
  /** Set when a stage was blocked; later contexts were not run. */
  halted: { stage: Stage; error: PolicyViolationError } | null;
};

/**
 * Drive one operation through its stage contexts in stage order, stopping at
 * the first violation. Aborts propagate.
 */
export async function runLifecycle(
  orchestrator: GateOrchestrator,
  lifecycle: Lifecycle,
  contexts: readonly OperationContext[],
  policy: PolicyEngine,
): Promise<LifecycleRun> {
  const ordered = [...contexts].sort((a, b) => stageIndex(a.stage) - stageIndex(b.stage));
  const completed: StageRun[] = [];

  for (const context of ordered) {
    try {
      completed.push(await orchestrator.runStage(lifecycle, context, policy));
    } catch (err) {
      if (err instanceof PolicyViolationError) return { completed, halted: { stage: context.stage, error: err } };
      throw err;
    }
  }
  return { completed, halted: null };
}
