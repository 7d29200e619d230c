import { describe, expect, it } from "vitest";
import {
  elapsedTime,
  escapeHtml,
  formatDate,
  formatLogTimestamp,
  formatTimestamp,
  normalizeWhitespace,
  parseDate,
  parseTimestamp,
} from "../utils.js";

describe("date formats", () => {
  it("formats version-file dates as MM-DD-YYYY", () => {
    expect(formatDate(new Date(2025, 2, 5, 15, 30))).toBe("03-05-2025");
  });

  it("formats last-check timestamps with seconds", () => {
    expect(formatTimestamp(new Date(2025, 2, 5, 15, 30, 2))).toBe("03-05-2025 15:30:02");
  });

  it("formats log timestamps in UTC", () => {
    expect(formatLogTimestamp(new Date(Date.UTC(2025, 2, 5, 7, 4, 9)))).toBe("2025-03-05 07:04:09");
  });

  it("parses what it formats", () => {
    expect(parseDate("03-05-2025")?.getTime()).toBe(new Date(2025, 2, 5).getTime());
    expect(parseTimestamp("03-05-2025 15:30:22")?.getTime()).toBe(new Date(2025, 2, 5, 15, 30, 22).getTime());
  });

  it("rejects malformed or impossible dates", () => {
    expect(parseDate("2025-03-05")).toBeNull();
    expect(parseDate("02-31-2025")).toBeNull();
    expect(parseTimestamp("03-05-2025")).toBeNull();
    expect(parseTimestamp("03-05-2025 15:61:00")).toBeNull();
  });
});

describe("elapsedTime", () => {
  it("keeps the two largest units", () => {
    const start = new Date(2025, 0, 5, 10, 0, 0);
    const now = new Date(2025, 0, 5, 11, 45, 30);
    expect(elapsedTime(start, now)).toBe("1 Hour, 45 Minutes");
  });

  it("pluralizes and appends the suffix", () => {
    const start = new Date(2025, 0, 1, 8, 0, 0);
    const now = new Date(2025, 0, 4, 10, 5, 0);
    expect(elapsedTime(start, now, { append: "ago" })).toBe("3 Days, 2 Hours ago");
  });

  it("reports zero seconds for an instant or a future start", () => {
    const now = new Date(2025, 0, 5, 10, 0, 0);
    expect(elapsedTime(now, now)).toBe("0 Seconds");
    expect(elapsedTime(new Date(2025, 0, 6), now)).toBe("0 Seconds");
  });

  it("uses Today and Yesterday for date-only values", () => {
    const now = new Date(2025, 0, 11, 8, 0, 0);
    expect(elapsedTime(new Date(2025, 0, 11), now, { dateOnly: true, append: "ago" })).toBe("Today");
    expect(elapsedTime(new Date(2025, 0, 10), now, { dateOnly: true, append: "ago" })).toBe("Yesterday");
  });

  it("falls back to units for older date-only values", () => {
    const now = new Date(2025, 0, 11, 12, 0, 0);
    expect(elapsedTime(new Date(2025, 0, 1), now, { dateOnly: true, append: "ago" })).toBe("1 Week, 3 Days ago");
  });
});

describe("text helpers", () => {
  it("escapes HTML special characters", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });

  it("collapses whitespace", () => {
    expect(normalizeWhitespace("  a \n\t b  ")).toBe("a b");
  });
});
