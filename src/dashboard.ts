import { errorMessage } from "./errors.js";
import type { EventLog } from "./log.js";
import type { VersionStore } from "./store.js";
import type { CachedLastCheck, CachedVersion, CheckTarget } from "./types.js";
import { elapsedTime, escapeHtml, parseDate, parseTimestamp } from "./utils.js";

export interface AppStatus {
  id: string;
  label: string;
  version: string | null;
  date: string | null;
  elapsed: string | null;
  enabled: boolean;
}

export interface LastCheckStatus {
  timestamp: string;
  app: string;
  elapsed: string;
}

export interface DashboardState {
  title: string;
  apps: AppStatus[];
  lastCheck: LastCheckStatus | null;
  log: string;
  logLines: number;
  logPath: string;
}

export interface DashboardSources {
  title: string;
  targets: CheckTarget[];
  store: VersionStore;
  log: EventLog;
  logLines: number;
  now?: () => Date;
}

function age(text: string, now: Date, dateOnly: boolean): string {
  const start = dateOnly ? parseDate(text) : parseTimestamp(text);
  return start ? elapsedTime(start, now, { dateOnly, append: "ago" }) : text;
}

async function safely<T>(read: () => Promise<T | null>, what: string): Promise<T | null> {
  try {
    return await read();
  } catch (err) {
    console.error(`[WEB] Unable to read ${what}:`, errorMessage(err));
    return null;
  }
}

/** Snapshot of the cached files; unreadable files leave their fields empty. */
export async function loadDashboardState(src: DashboardSources): Promise<DashboardState> {
  const now = (src.now ?? (() => new Date()))();

  const apps: AppStatus[] = [];
  for (const target of src.targets) {
    const cached = await safely<CachedVersion>(() => src.store.readVersion(target.versionFile), target.versionFile);
    apps.push({
      id: target.app.id,
      label: target.label,
      version: cached?.version ?? null,
      date: cached?.dateText ?? null,
      elapsed: cached?.dateText ? age(cached.dateText, now, true) : null,
      enabled: target.schedule !== null,
    });
  }

  const last = await safely<CachedLastCheck>(() => src.store.readLastCheck(), "last-check file");

  return {
    title: src.title,
    apps,
    lastCheck: last
      ? { timestamp: last.timestampText, app: last.label, elapsed: age(last.timestampText, now, false) }
      : null,
    log: src.log.tail(src.logLines),
    logLines: src.logLines,
    logPath: src.log.filePath,
  };
}

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 2rem; background: #111; color: #eee; }
table { border-collapse: collapse; min-width: 32rem; }
th, td { text-align: left; padding: .4rem .8rem; border-bottom: 1px solid #333; }
.muted { color: #888; }
pre { background: #000; padding: 1rem; overflow-x: auto; }
`;

function appRow(a: AppStatus): string {
  const version = a.version ? escapeHtml(a.version) : `<span class="muted">unknown</span>`;
  const date = a.date ? escapeHtml(a.date) : "";
  const elapsed = a.elapsed ? escapeHtml(a.elapsed) : "";
  const label = escapeHtml(a.label) + (a.enabled ? "" : ` <span class="muted">(disabled)</span>`);
  return `<tr><td>${label}</td><td>${version}</td><td>${date}</td><td>${elapsed}</td></tr>`;
}

export function renderDashboard(state: DashboardState): string {
  const title = escapeHtml(state.title);
  const lastCheck = state.lastCheck
    ? `<p>Last check: <b>${escapeHtml(state.lastCheck.app)}</b> at ${escapeHtml(state.lastCheck.timestamp)} ` +
      `(${escapeHtml(state.lastCheck.elapsed)})</p>`
    : `<p class="muted">No checks recorded yet.</p>`;

  return [
    "<!DOCTYPE html>",
    `<html lang="en">`,
    "<head>",
    `<meta charset="utf-8">`,
    `<meta http-equiv="refresh" content="60">`,
    `<title>${title}</title>`,
    `<style>${STYLE}</style>`,
    "</head>",
    "<body>",
    `<h1>${title}</h1>`,
    "<table>",
    "<thead><tr><th>Application</th><th>Version</th><th>Recorded</th><th>Age</th></tr></thead>",
    `<tbody>${state.apps.map(appRow).join("")}</tbody>`,
    "</table>",
    lastCheck,
    `<h2>Log <span class="muted">(last ${state.logLines} lines of ${escapeHtml(state.logPath)})</span></h2>`,
    `<pre>${escapeHtml(state.log)}</pre>`,
    "</body>",
    "</html>",
  ].join("\n");
}
