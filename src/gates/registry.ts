import { ProvenanceError } from "../errors.js";
import type { Gate } from "../types/gate.js";
import { type Stage, STAGES } from "../types/stage.js";

/**
 * Which gate implementations apply to which stage. Gates are added and removed
 * here by name; the orchestrator never changes when the catalog does.
 */
export class GateRegistry {
  private readonly gates = new Map<string, Gate>();
  private readonly byStage = new Map<Stage, string[]>();

  register(gate: Gate, stages: readonly Stage[] = STAGES): this {
    const existing = this.gates.get(gate.name);
    if (existing && existing !== gate) {
      throw new ProvenanceError("DUPLICATE_GATE", `A different gate named "${gate.name}" is already registered`);
    }
    this.gates.set(gate.name, gate);
    for (const stage of stages) {
      const names = this.byStage.get(stage) ?? [];
      if (!names.includes(gate.name)) names.push(gate.name);
      this.byStage.set(stage, names);
    }
    return this;
  }

  /** Remove a gate from one stage, or from every stage when `stage` is omitted. */
  unregister(name: string, stage?: Stage): boolean {
    if (!this.gates.has(name)) return false;
    const stages = stage ? [stage] : [...this.byStage.keys()];
    for (const s of stages) {
      const names = this.byStage.get(s);
      if (names) this.byStage.set(s, names.filter((n) => n !== name));
    }
    const stillUsed = [...this.byStage.values()].some((names) => names.includes(name));
    if (!stillUsed) this.gates.delete(name);
    return true;
  }

  get(name: string): Gate | undefined {
    return this.gates.get(name);
  }

  /** The gate registered under `name` for `stage`, if any. */
  resolve(name: string, stage: Stage): Gate | undefined {
    return this.byStage.get(stage)?.includes(name) ? this.gates.get(name) : undefined;
  }

  forStage(stage: Stage): Gate[] {
    return (this.byStage.get(stage) ?? []).flatMap((n) => {
      const gate = this.gates.get(n);
      return gate ? [gate] : [];
    });
  }

  names(): string[] {
    return [...this.gates.keys()].sort();
  }
}
