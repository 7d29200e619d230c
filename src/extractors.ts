import * as cheerio from "cheerio";
import { ExtractionError } from "./errors.js";
import { pageText, textOf } from "./scraper.js";
import type { ExtractedVersion } from "./types.js";

// Dotted version token without a trailing sentence period: "0.283", "2.9.1"
const VERSION = String.raw`(\d+(?:\.\d+)*)`;

function snippet(text: string): string {
  return JSON.stringify(text.slice(0, 200));
}

function matchPageText(html: string, pattern: RegExp, what: string): RegExpExecArray {
  const text = pageText(html);
  const m = pattern.exec(text);
  if (!m) {
    throw new ExtractionError(`Could not find ${what}. First 200 chars: ${snippet(text)}`);
  }
  return m;
}

const group = (m: RegExpExecArray, index: number): string => m[index] ?? "";

/** "MAME - Update ROMs (v0.282 to v0.283)": the target is the new version. */
export function extractMameVersion(html: string): ExtractedVersion {
  const m = matchPageText(
    html,
    new RegExp(String.raw`MAME\s*-\s*Update ROMs\s*\(v${VERSION}\s+to\s+v${VERSION}\)`, "i"),
    "'MAME - Update ROMs' version string on Pleasuredome page",
  );
  return { version: group(m, 2), previous: group(m, 1) };
}

/**
 * Changelog entries are <h4> headings such as "Version 13.24 - March 5, 2025".
 * Betas are flagged with "beta" or a "?" in the heading. The first stable
 * entry wins; when every entry is a beta, the first one is reported as such.
 */
export function extractLaunchBoxVersion(html: string): ExtractedVersion {
  const $ = cheerio.load(html);
  const candidates: ExtractedVersion[] = [];

  for (const heading of $("h4").toArray()) {
    const text = textOf([heading]);
    const m = new RegExp(String.raw`\bVersion\s+${VERSION}`, "i").exec(text);
    if (!m) continue;
    const prerelease = text.toLowerCase().includes("beta") || text.includes("?");
    candidates.push({ version: group(m, 1), prerelease });
  }

  const first = candidates[0];
  if (!first) {
    const text = textOf($.root().toArray());
    throw new ExtractionError(
      `Could not find any 'Version X.Y' headings on LaunchBox changelog page. First 200 chars: ${snippet(text)}`,
    );
  }

  return candidates.find((c) => !c.prerelease) ?? first;
}

export function extractLedBlinkyVersion(html: string): ExtractedVersion {
  const m = matchPageText(
    html,
    new RegExp(String.raw`LEDBlinky\s+v${VERSION}`, "i"),
    "LEDBlinky version string on download page",
  );
  return { version: group(m, 1) };
}

export function extractRetroArchVersion(html: string): ExtractedVersion {
  const m = matchPageText(
    html,
    new RegExp(String.raw`The current stable version is:\s*${VERSION}`, "i"),
    "RetroArch stable version string on platforms page",
  );
  return { version: group(m, 1) };
}

export function extractScummVmVersion(html: string): ExtractedVersion {
  const m = matchPageText(
    html,
    new RegExp(String.raw`The latest STABLE release of ScummVM is\s+${VERSION}`, "i"),
    "ScummVM stable version string on downloads page",
  );
  return { version: group(m, 1) };
}
