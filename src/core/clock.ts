import type { ReceiptTimestamp } from "../types/receipt.js";

/** Injected time source. `now` is epoch milliseconds; `monotonic` is nanoseconds. */
export interface Clock {
  now(): number;
  monotonic(): bigint;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => process.hrtime.bigint(),
};

export function isoAt(ms: number): string {
  return new Date(ms).toISOString();
}

/**
 * Receipt timestamps for one lifecycle instance. Neither component ever goes
 * backwards, even if the wall clock is stepped back between stages.
 */
export class LifecycleStamper {
  private lastWall = Number.NEGATIVE_INFINITY;
  private lastMono = -1n;

  constructor(private readonly clock: Clock) {}

  stamp(): ReceiptTimestamp {
    const wall = Math.max(this.clock.now(), this.lastWall);
    let mono = this.clock.monotonic();
    if (mono <= this.lastMono) mono = this.lastMono + 1n;
    this.lastWall = wall;
    this.lastMono = mono;
    return { wall: isoAt(wall), mono: mono.toString() };
  }
}
