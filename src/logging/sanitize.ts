import { isAbsolute, resolve, sep } from "node:path";

export const MAX_LOG_MESSAGE_LENGTH = 10000;

/** Escape control characters so one record stays on one line. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s
    .replace(/[\r\n]/g, "\\n")
    .replace(/\t/g, "\\t")
    .slice(0, MAX_LOG_MESSAGE_LENGTH);
}

/** Mask secrets and key material before anything is logged. */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = s;
  result = result.replace(/-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g, "[private key]");
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/api[_-]?key[=:]\s*\S+/gi, "api_key=***");
  result = result.replace(/(root[_-]?)?secret[=:]\s*\S+/gi, "secret=***");
  result = result.replace(/material[=:]\s*[0-9a-f]{16,}/gi, "material=***");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");
  return result;
}

export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }
  if (component.includes("..") || component.includes("/") || component.includes("\\") || component.includes("\0")) {
    throw new Error(`Invalid path component: ${component}`);
  }
  return component.trim();
}

/** Join components under `base`, refusing anything that escapes it. */
export function safePath(base: string, ...components: string[]): string {
  const root = resolve(base);
  if (!isAbsolute(root)) {
    throw new Error(`Base path must resolve to an absolute path: ${base}`);
  }
  const full = resolve(root, ...components.map(sanitizePathComponent));
  if (full !== root && !full.startsWith(root + sep)) {
    throw new Error(`Path traversal detected: ${full}`);
  }
  return full;
}
