import fs from "node:fs/promises";
import path from "node:path";
import type { AbortDiagnostic } from "../errors.js";
import type { Logger } from "./logger.js";
import { redactSensitiveInfo, sanitizeLogMessage } from "./sanitize.js";

/**
 * Local, unsealed record of aborted runs. These lines are for operators
 * debugging a failure; they carry no evidentiary weight.
 */
export class DiagnosticLog {
  private readonly recorded: AbortDiagnostic[] = [];

  constructor(private readonly logger: Logger, private readonly filePath: string | null = null) {}

  async record(diagnostic: AbortDiagnostic): Promise<void> {
    const entry: AbortDiagnostic = { ...diagnostic, message: redactSensitiveInfo(sanitizeLogMessage(diagnostic.message)) };
    this.recorded.push(entry);
    this.logger.error("OPERATION_ABORTED", entry.message, {
      operation_id: entry.operation_id,
      lifecycle_id: entry.lifecycle_id,
      stage: entry.stage,
      state: entry.state,
      error_code: entry.error_code,
    });

    if (!this.filePath) return;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, JSON.stringify({ kind: "abort", ...entry }) + "\n", "utf8");
    } catch (err) {
      this.logger.warn("DIAGNOSTIC_WRITE_FAILED", `Could not write abort diagnostic to ${this.filePath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  entries(): AbortDiagnostic[] {
    return [...this.recorded];
  }
}
