import * as core from "@actions/core";
import * as cheerio from "cheerio";
import type { ListingSelectors, ScrapeSourceConfig } from "../config.js";
import type { CompletionClient } from "../summarizer/client.js";
import { responseText } from "../summarizer/client.js";
import {
  createPaper,
  toPlainText,
  truncateCodePoints,
  USER_AGENT,
  type Paper,
} from "./types.js";

const MAX_PAGE_TEXT_LENGTH = 15_000;
const MAX_LISTING_ENTRIES = 20;
const PAGE_TIMEOUT_MS = 15_000;

const SYSTEM_PROMPT = `You are a research paper link extractor. Given the cleaned text of a listing page from an economics working paper series, extract every paper entry you can find.

Respond with ONLY a valid JSON array of objects with these fields:
[{"title": "Paper Title", "url": "https://example.com/paper", "authors": "Jane Doe, John Roe", "abstract": "First lines of the abstract"}]

"authors" and "abstract" may be empty strings when the page does not show them.
If no paper entries are found, respond with an empty array: []`;

export interface ListingEntry {
  title: string;
  url: string;
  authors: string;
  abstract: string;
}

/** Model used when the page markup does not match the configured selectors. */
export interface ListingExtractor {
  client: CompletionClient;
  model: string;
}

function elementText(element: { text(): string }): string {
  return element.text().replace(/\s+/g, " ").trim();
}

export function extractWithSelectors(
  html: string,
  selectors: ListingSelectors
): ListingEntry[] {
  const $ = cheerio.load(html);
  const entries: ListingEntry[] = [];

  for (const item of $(selectors.item).toArray().slice(0, MAX_LISTING_ENTRIES)) {
    const row = $(item);
    const link = row.find(selectors.title).first();
    if (link.length === 0) continue;

    entries.push({
      title: elementText(link),
      url: (link.attr("href") ?? "").trim(),
      authors: elementText(row.find(selectors.authors).first()),
      abstract: elementText(row.find(selectors.abstract).first()),
    });
  }

  return entries;
}

export function cleanHtml(html: string): string {
  let text = html;

  text = text.replace(/<script[\s\S]*?<\/script>/gi, "");
  text = text.replace(/<style[\s\S]*?<\/style>/gi, "");
  text = text.replace(/<nav[\s\S]*?<\/nav>/gi, "");
  text = text.replace(/<footer[\s\S]*?<\/footer>/gi, "");
  text = text.replace(/<header[\s\S]*?<\/header>/gi, "");

  // <a href="url">text</a> -> [text](url)
  text = text.replace(
    /<a\s+[^>]*href=["']([^"']*)["'][^>]*>([\s\S]*?)<\/a>/gi,
    (_, url: string, linkText: string) => {
      const clean = toPlainText(linkText);
      return clean ? `[${clean}](${url})` : "";
    }
  );

  return truncateCodePoints(toPlainText(text), MAX_PAGE_TEXT_LENGTH);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function optionalString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

// Index of the "]" closing the array opened at `start`, skipping brackets
// inside JSON strings; -1 when the array never closes.
function findArrayEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "[") depth++;
    else if (ch === "]" && --depth === 0) return i;
  }
  return -1;
}

function toEntries(items: unknown[]): ListingEntry[] {
  const entries: ListingEntry[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    if (typeof item.title !== "string" || typeof item.url !== "string") {
      continue;
    }
    entries.push({
      title: item.title.trim(),
      url: item.url.trim(),
      authors: optionalString(item.authors),
      abstract: optionalString(item.abstract),
    });
  }
  return entries;
}

/**
 * First JSON array of objects in a model reply. Bracketed prose such as
 * "[2 found]" before the array is skipped.
 */
export function extractFirstJsonArray(text: string): ListingEntry[] {
  for (
    let start = text.indexOf("[");
    start !== -1;
    start = text.indexOf("[", start + 1)
  ) {
    const end = findArrayEnd(text, start);
    if (end === -1) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text.slice(start, end + 1));
    } catch {
      continue;
    }

    if (!Array.isArray(parsed)) continue;
    if (parsed.length > 0 && !parsed.some(isRecord)) continue;
    return toEntries(parsed);
  }
  return [];
}

export function resolveUrl(base: string, href: string): string {
  try {
    return new URL(href, base).href;
  } catch {
    return href;
  }
}

async function extractWithModel(
  html: string,
  pageUrl: string,
  extractor: ListingExtractor
): Promise<ListingEntry[]> {
  const cleaned = cleanHtml(html);
  core.info(`Extracting entries from ${pageUrl} (${cleaned.length} chars)`);

  const message = await extractor.client.messages.create({
    model: extractor.model,
    max_tokens: 4096,
    system: SYSTEM_PROMPT,
    messages: [
      {
        role: "user",
        content: `Extract all paper entries from this listing page content:\n\n${cleaned}`,
      },
    ],
  });

  return extractFirstJsonArray(responseText(message));
}

function toPapers(
  entries: ListingEntry[],
  sourceName: string,
  pageUrl: string
): Paper[] {
  const papers: Paper[] = [];

  for (const entry of entries) {
    if (!entry.title || !entry.url) continue;
    papers.push(
      createPaper({
        title: entry.title,
        url: resolveUrl(pageUrl, entry.url),
        source: sourceName,
        authors: entry.authors,
        abstract: entry.abstract,
        date: null,
      })
    );
    if (papers.length === MAX_LISTING_ENTRIES) break;
  }

  return papers;
}

export async function collectListing(
  sourceName: string,
  source: ScrapeSourceConfig,
  extractor?: ListingExtractor,
  fetchFn: typeof fetch = fetch
): Promise<Paper[]> {
  try {
    const response = await fetchFn(source.url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(PAGE_TIMEOUT_MS),
    });
    if (!response.ok) {
      core.warning(`HTTP ${response.status} for ${source.url}`);
      return [];
    }

    const html = await response.text();
    const matched = toPapers(
      extractWithSelectors(html, source.selectors),
      sourceName,
      source.url
    );
    if (matched.length > 0) return matched;

    if (!extractor) {
      core.warning(
        `No entries matched the selectors for ${sourceName}; set ANTHROPIC_API_KEY to extract them with a model`
      );
      return [];
    }

    const entries = await extractWithModel(html, source.url, extractor);
    return toPapers(entries, sourceName, source.url);
  } catch (error) {
    core.warning(
      `Error scraping ${sourceName}: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }
}
