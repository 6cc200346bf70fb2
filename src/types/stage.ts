/** Lifecycle stages in the order their anchors are derived. */
export const STAGES = ["dataset", "model", "training", "deployment", "inference"] as const;

export type Stage = (typeof STAGES)[number];

/** Position of an anchor in the chain: the root precedes every stage. */
export type AnchorPosition = "root" | Stage;

export function isStage(value: unknown): value is Stage {
  return STAGES.some((s) => s === value);
}

/** The chain position an anchor for `stage` must be derived from. */
export function previousPosition(stage: Stage): AnchorPosition {
  const idx = STAGES.indexOf(stage);
  return idx === 0 ? "root" : STAGES[idx - 1];
}

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}
