import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { ProvenanceError, StorageUnavailableError } from "../errors.js";
import { type AppendOnlyLog, type LogEntry, type LogRange, isLogEntry } from "./log.js";

/** Append-only JSON-lines file, one entry per line. */
export class JsonlFileLog implements AppendOnlyLog {
  private ids: Set<string> | null = null;

  constructor(readonly filePath: string) {}

  async append(entry: LogEntry): Promise<boolean> {
    const ids = await this.knownIds();
    const key = `${entry.kind}:${entry.id}`;
    if (ids.has(key)) return false;
    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.appendFile(this.filePath, JSON.stringify(entry) + "\n", "utf8");
    } catch (err) {
      throw new StorageUnavailableError(`Could not append to ${this.filePath}`, err);
    }
    ids.add(key);
    return true;
  }

  async *read(range: LogRange = {}): AsyncIterable<LogEntry> {
    if (!fs.existsSync(this.filePath)) return;
    const from = range.from ?? 0;
    const to = range.to ?? Number.POSITIVE_INFINITY;

    const stream = fs.createReadStream(this.filePath, "utf8");
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    let index = 0;
    let lineNo = 0;
    try {
      for await (const line of lines) {
        lineNo++;
        if (line.trim().length === 0) continue;
        if (index >= to) break;
        if (index++ < from) continue;
        yield parseLine(line, this.filePath, lineNo);
      }
    } finally {
      lines.close();
      stream.destroy();
    }
  }

  private async knownIds(): Promise<Set<string>> {
    if (this.ids) return this.ids;
    const ids = new Set<string>();
    for await (const entry of this.read()) ids.add(`${entry.kind}:${entry.id}`);
    this.ids = ids;
    return ids;
  }
}

function parseLine(line: string, filePath: string, lineNo: number): LogEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new ProvenanceError("LOG_CORRUPT", `Unparseable entry at ${filePath}:${lineNo}`, { cause: err });
  }
  if (!isLogEntry(parsed)) {
    throw new ProvenanceError("LOG_CORRUPT", `Malformed entry at ${filePath}:${lineNo}`);
  }
  return parsed;
}
