import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { APPS } from "../../apps.js";
import { DEFAULT_SCHEDULE } from "../../config.js";
import type { CheckTarget, Notification, Notifier } from "../../types.js";

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "version-watch-"));
}

export function target(id: string, overrides: Partial<Omit<CheckTarget, "app">> = {}): CheckTarget {
  const app = APPS.find((a) => a.id === id);
  if (!app) throw new Error(`no app ${id}`);
  return {
    app,
    url: app.defaultUrl,
    versionFile: `${app.id}.ver`,
    label: app.label,
    schedule: DEFAULT_SCHEDULE,
    notifyOnUpdate: true,
    notifyOnError: true,
    ...overrides,
  };
}

export class RecordingNotifier implements Notifier {
  readonly sent: Notification[] = [];

  constructor(private readonly result = true) {}

  async send(notification: Notification): Promise<boolean> {
    this.sent.push(notification);
    return this.result;
  }
}

export const read = (p: string): string => fs.readFileSync(p, "utf8");
