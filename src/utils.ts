const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

// MM-DD-YYYY, local time. Format of the second line of a version file.
export function formatDate(d: Date): string {
  return `${pad(d.getMonth() + 1)}-${pad(d.getDate())}-${d.getFullYear()}`;
}

// MM-DD-YYYY HH:MM:SS, local time. Format of the last-check file.
export function formatTimestamp(d: Date): string {
  return `${formatDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

// YYYY-MM-DD HH:MM:SS, UTC. Prefix of every activity log line.
export function formatLogTimestamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

const DATE_RE = /^(\d{2})-(\d{2})-(\d{4})$/;
const TIMESTAMP_RE = /^(\d{2})-(\d{2})-(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;

function buildDate(
  month: number,
  day: number,
  year: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | null {
  const d = new Date(year, month - 1, day, hours, minutes, seconds);
  // Reject rollovers such as 02-31
  if (d.getMonth() !== month - 1 || d.getDate() !== day || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return d;
}

export function parseDate(input: string): Date | null {
  const m = DATE_RE.exec(input.trim());
  if (!m) return null;
  return buildDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function parseTimestamp(input: string): Date | null {
  const m = TIMESTAMP_RE.exec(input.trim());
  if (!m) return null;
  return buildDate(
    Number(m[1]),
    Number(m[2]),
    Number(m[3]),
    Number(m[4]),
    Number(m[5]),
    Number(m[6]),
  );
}

const INTERVALS: ReadonlyArray<readonly [string, number]> = [
  ["Years", 31536000],
  ["Months", 2592000],
  ["Weeks", 604800],
  ["Days", 86400],
  ["Hours", 3600],
  ["Minutes", 60],
  ["Seconds", 1],
];

function sameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();
}

/**
 * Human-readable age of `start`, at most two units, e.g. "1 Hour, 45 Minutes".
 * With `dateOnly`, values from today or yesterday read "Today" / "Yesterday"
 * and take no suffix.
 */
export function elapsedTime(
  start: Date,
  now: Date,
  options: { dateOnly?: boolean; append?: string } = {},
): string {
  const suffix = options.append ? ` ${options.append}` : "";

  if (options.dateOnly) {
    if (sameDay(start, now)) return "Today";
    const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
    if (sameDay(start, yesterday)) return "Yesterday";
  }

  let seconds = Math.max(0, Math.floor((now.getTime() - start.getTime()) / 1000));
  const parts: string[] = [];
  for (const [name, size] of INTERVALS) {
    const value = Math.floor(seconds / size);
    if (!value) continue;
    seconds -= value * size;
    parts.push(`${value} ${value === 1 ? name.slice(0, -1) : name}`);
    if (parts.length === 2) break;
  }
  if (parts.length === 0) parts.push("0 Seconds");

  return `${parts.join(", ")}${suffix}`;
}
