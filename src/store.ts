import fs from "node:fs";
import path from "node:path";
import { StoreError, errorMessage } from "./errors.js";
import type { CachedLastCheck, CachedVersion, LastCheckRecord, VersionRecord } from "./types.js";
import { formatDate, formatTimestamp } from "./utils.js";

function readLines(p: string): string[] | null {
  if (!fs.existsSync(p)) return null;
  try {
    return fs.readFileSync(p, "utf8").split(/\r?\n/);
  } catch (err) {
    throw new StoreError(p, `error reading '${p}': ${errorMessage(err)}`, err);
  }
}

function writeLines(p: string, lines: string[]): void {
  try {
    fs.mkdirSync(path.dirname(p), { recursive: true });
    fs.writeFileSync(p, lines.map((l) => `${l}\n`).join(""), "utf8");
  } catch (err) {
    throw new StoreError(p, `error writing '${p}': ${errorMessage(err)}`, err);
  }
}

/**
 * Version files (`<id>.ver`: version, then MM-DD-YYYY) and the shared
 * last-check file (timestamp, then checker label), all under one data dir.
 */
export class VersionStore {
  readonly dataDir: string;

  constructor(dataDir: string, readonly lastCheckFile = "lastcheck") {
    this.dataDir = path.resolve(dataDir);
  }

  versionPath(file: string): string {
    return path.join(this.dataDir, file);
  }

  get lastCheckPath(): string {
    return path.join(this.dataDir, this.lastCheckFile);
  }

  /** Null when the file is missing or its first line is blank. */
  async readVersion(file: string): Promise<CachedVersion | null> {
    const lines = readLines(this.versionPath(file));
    if (!lines) return null;
    const version = (lines[0] ?? "").trim();
    if (!version) return null;
    const dateText = (lines[1] ?? "").trim();
    return { version, dateText: dateText || null };
  }

  async writeVersion(file: string, record: VersionRecord): Promise<void> {
    writeLines(this.versionPath(file), [record.version, formatDate(record.recordedAt)]);
  }

  async readLastCheck(): Promise<CachedLastCheck | null> {
    const lines = readLines(this.lastCheckPath);
    if (!lines) return null;
    const timestampText = (lines[0] ?? "").trim();
    const label = (lines[1] ?? "").trim();
    if (!timestampText || !label) return null;
    return { timestampText, label };
  }

  async writeLastCheck(record: LastCheckRecord): Promise<void> {
    writeLines(this.lastCheckPath, [formatTimestamp(record.timestamp), record.label]);
  }
}
