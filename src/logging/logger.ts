import type { JsonValue } from "../types/json.js";
import type { LogFormat, LogLevel } from "../types/config.js";
import { redactSensitiveInfo, sanitizeLogMessage } from "./sanitize.js";

export type LogFields = Record<string, JsonValue | undefined>;

export type LogRecord = {
  ts: string;
  level: LogLevel;
  code: string;
  message: string;
} & LogFields;

export interface Logger {
  debug(code: string, message: string, fields?: LogFields): void;
  info(code: string, message: string, fields?: LogFields): void;
  warn(code: string, message: string, fields?: LogFields): void;
  error(code: string, message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Receives one line per record, newline included. Defaults to stderr. */
  write?: (line: string) => void;
  fields?: LogFields;
  now?: () => number;
};

const RESERVED = new Set(["ts", "level", "code", "message"]);

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function cleanFields(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined || RESERVED.has(k)) continue;
    out[k] = typeof v === "string" ? redactSensitiveInfo(sanitizeLogMessage(v)) : v;
  }
  return out;
}

function formatHuman(record: LogRecord): string {
  const { ts, level, code, message, ...rest } = record;
  const extras = Object.entries(rest)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return [ts, level.toUpperCase().padEnd(5), `[${code}]`, message, ...extras].join(" ");
}

/** Structured logger writing one JSON object (or human line) per record. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[opts.level ?? "info"];
  const format = opts.format ?? "jsonl";
  const write = opts.write ?? ((line: string) => void process.stderr.write(line));
  const now = opts.now ?? Date.now;
  const base = cleanFields(opts.fields ?? {});

  const emit = (level: LogLevel, code: string, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const record: LogRecord = {
      ts: new Date(now()).toISOString(),
      level,
      code,
      message: redactSensitiveInfo(sanitizeLogMessage(message)),
      ...base,
      ...cleanFields(fields ?? {}),
    };
    write((format === "jsonl" ? JSON.stringify(record) : formatHuman(record)) + "\n");
  };

  return {
    debug: (code, message, fields) => emit("debug", code, message, fields),
    info: (code, message, fields) => emit("info", code, message, fields),
    warn: (code, message, fields) => emit("warn", code, message, fields),
    error: (code, message, fields) => emit("error", code, message, fields),
    child: (fields) => createLogger({ ...opts, fields: { ...opts.fields, ...fields } }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
