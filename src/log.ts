import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";
import { formatLogTimestamp } from "./utils.js";

/**
 * Append-only activity log shared by every checker and tailed by the
 * dashboard. Lines look like `2025-03-05 15:30:22 (+) MAME: version 0.283 is current`.
 */
export class EventLog {
  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  info(message: string): void {
    this.write(true, message);
  }

  error(message: string): void {
    this.write(false, message);
  }

  write(ok: boolean, message: string): void {
    const line = `${formatLogTimestamp(this.now())} ${ok ? "(+)" : "(-)"} ${message}\n`;

    if (ok) console.log(`[CHECK] ${message}`);
    else console.error(`[CHECK] ${message}`);

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, line, "utf8");
    } catch (err) {
      console.error(`[CHECK] Unable to write log file '${this.filePath}':`, errorMessage(err));
    }
  }

  /**
   * Last `count` lines of the log; the whole log when `count` is 0 or less.
   * "" when the file is missing or unreadable.
   */
  tail(count: number): string {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch {
      return "";
    }
    const lines = raw.split(/\r?\n/);
    if (lines[lines.length - 1] === "") lines.pop();
    return (count > 0 ? lines.slice(-count) : lines).join("\n");
  }
}
