/**
 * Stage run states. SEALED and ABORTED are terminal.
 */
export const RUN_STATES = ["IDLE", "GATES_RUNNING", "AGGREGATING", "ENFORCING", "SEALED", "ABORTED"] as const;

export type RunState = (typeof RUN_STATES)[number];

/**
 * Events that drive state transitions.
 */
export type RunEvent = "start" | "gates_done" | "fail_fast" | "aggregated" | "sealed" | "error";

const TRANSITIONS: Record<RunState, Partial<Record<RunEvent, RunState>>> = {
  IDLE: { start: "GATES_RUNNING", error: "ABORTED" },
  GATES_RUNNING: { gates_done: "AGGREGATING", fail_fast: "ENFORCING", error: "ABORTED" },
  AGGREGATING: { aggregated: "ENFORCING", error: "ABORTED" },
  ENFORCING: { sealed: "SEALED", error: "ABORTED" },
  SEALED: {},
  ABORTED: {},
};

export class IllegalTransitionError extends Error {
  constructor(readonly state: RunState, readonly event: RunEvent) {
    super(`Illegal transition: ${event} in state ${state}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Pure function: given current state + event, return next state.
 */
export function nextState(current: RunState, event: RunEvent): RunState {
  const next = TRANSITIONS[current][event];
  if (!next) throw new IllegalTransitionError(current, event);
  return next;
}

export function isTerminal(state: RunState): boolean {
  return state === "SEALED" || state === "ABORTED";
}

/** Current state plus the path taken to reach it. */
export class RunTracker {
  private current: RunState = "IDLE";
  private readonly path: RunState[] = ["IDLE"];

  get state(): RunState {
    return this.current;
  }

  get transitions(): RunState[] {
    return [...this.path];
  }

  apply(event: RunEvent): RunState {
    this.current = nextState(this.current, event);
    this.path.push(this.current);
    return this.current;
  }
}
