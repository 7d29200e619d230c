import axios from "axios";
import * as cheerio from "cheerio";
import { type AnyNode, isDocument, isTag, isText } from "domhandler";
import { FetchError, errorMessage } from "./errors.js";
import { normalizeWhitespace } from "./utils.js";

export const USER_AGENT = "arcade-version-watch/1.0 (+version checker)";
export const DEFAULT_FETCH_TIMEOUT_MS = 20000;

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template"]);

export type PageFetcher = (url: string) => Promise<string>;

export async function fetchPage(url: string, timeoutMs = DEFAULT_FETCH_TIMEOUT_MS): Promise<string> {
  const res = await axios
    .get<string>(url, {
      timeout: timeoutMs,
      responseType: "text",
      headers: { "User-Agent": USER_AGENT },
      validateStatus: () => true,
    })
    .catch((err: unknown) => {
      throw new FetchError(url, `HTTP request failed: ${errorMessage(err)}`, { cause: err });
    });

  if (res.status !== 200) {
    throw new FetchError(url, `Unexpected HTTP status ${res.status}`, { status: res.status });
  }

  return typeof res.data === "string" ? res.data : String(res.data);
}

function collectText(nodes: AnyNode[], parts: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const value = node.data.trim();
      if (value) parts.push(value);
    } else if (isTag(node)) {
      if (!SKIPPED_TAGS.has(node.name)) collectText(node.children, parts);
    } else if (isDocument(node)) {
      collectText(node.children, parts);
    }
  }
}

/** Visible text of some nodes, text nodes joined by single spaces. */
export function textOf(nodes: AnyNode[]): string {
  const parts: string[] = [];
  collectText(nodes, parts);
  return normalizeWhitespace(parts.join(" "));
}

export function pageText(html: string): string {
  const $ = cheerio.load(html);
  return textOf($.root().toArray());
}
