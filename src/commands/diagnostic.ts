export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
