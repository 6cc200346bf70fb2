import { PolicyValidationError } from "../errors.js";
import type { PolicyDocument, PolicyRef } from "../types/policy.js";
import { PolicyEngine } from "./engine.js";

/**
 * Every policy version that has governed a run, keyed by `policy_id@version`,
 * so historical receipts can be replayed against the exact rules they name.
 */
export class PolicyHistory {
  private readonly versions = new Map<string, PolicyEngine>();

  /** Register a version. Re-registering identical content is a no-op; different content under the same version is rejected. */
  register(document: PolicyDocument): PolicyEngine {
    const engine = PolicyEngine.fromDocument(document);
    const key = refKey(engine.ref);
    const existing = this.versions.get(key);
    if (existing) {
      if (existing.ref.digest !== engine.ref.digest) {
        throw new PolicyValidationError(`Policy ${key} already registered with different content`);
      }
      return existing;
    }
    this.versions.set(key, engine);
    return engine;
  }

  get(policyId: string, version: string): PolicyEngine | undefined {
    return this.versions.get(`${policyId}@${version}`);
  }

  /** Engine a receipt's policy reference points at, if its digest also matches. */
  resolve(ref: PolicyRef): PolicyEngine | undefined {
    const engine = this.versions.get(refKey(ref));
    return engine && engine.ref.digest === ref.digest ? engine : undefined;
  }

  refs(): PolicyRef[] {
    return [...this.versions.values()].map((e) => ({ ...e.ref }));
  }
}

function refKey(ref: Pick<PolicyRef, "policy_id" | "version">): string {
  return `${ref.policy_id}@${ref.version}`;
}
