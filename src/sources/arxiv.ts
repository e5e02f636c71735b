import * as core from "@actions/core";
import { XMLParser } from "fast-xml-parser";
import type { ArxivSourceConfig } from "../config.js";
import { createPaper, parseDate, type Paper } from "./types.js";

const ARXIV_API_URL = "https://export.arxiv.org/api/query";

interface ArxivAuthor {
  name: string;
}

interface ArxivEntry {
  id: string;
  title: string;
  summary: string;
  author?: ArxivAuthor | ArxivAuthor[];
  published?: string;
}

function buildArxivQuery(source: ArxivSourceConfig): string {
  const catParts = source.categories.map((c) => `cat:${c}`);
  return catParts.length > 1 ? `(${catParts.join(" OR ")})` : catParts[0];
}

function buildArxivUrl(query: string, maxResults: number): string {
  const url = new URL(ARXIV_API_URL);
  url.searchParams.set("search_query", query);
  url.searchParams.set("start", "0");
  url.searchParams.set("max_results", String(maxResults));
  url.searchParams.set("sortBy", "submittedDate");
  url.searchParams.set("sortOrder", "descending");
  return url.toString();
}

function parseAuthors(author: ArxivEntry["author"]): string {
  if (!author) return "";
  const authors = Array.isArray(author) ? author : [author];
  return authors.map((a) => String(a.name)).join(", ");
}

function normalizeWhitespace(text: unknown): string {
  return String(text ?? "").replace(/\s+/g, " ").trim();
}

function parseArxivFeed(xml: string): ArxivEntry[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    removeNSPrefix: true,
  });
  const parsed: { feed?: { entry?: ArxivEntry | ArxivEntry[] } } =
    parser.parse(xml);

  const entry = parsed.feed?.entry;
  if (!entry) return [];
  return Array.isArray(entry) ? entry : [entry];
}

export async function collectArxiv(
  sourceName: string,
  source: ArxivSourceConfig,
  fetchFn: typeof fetch = fetch
): Promise<Paper[]> {
  const url = buildArxivUrl(buildArxivQuery(source), source.max_results);

  core.info(`arXiv query URL: ${url}`);

  try {
    const response = await fetchFn(url);
    if (!response.ok) {
      core.warning(`arXiv API returned ${response.status} for ${sourceName}`);
      return [];
    }

    const entries = parseArxivFeed(await response.text());

    return entries.map((entry) =>
      createPaper({
        title: normalizeWhitespace(entry.title),
        url: normalizeWhitespace(entry.id),
        source: sourceName,
        authors: parseAuthors(entry.author),
        abstract: normalizeWhitespace(entry.summary),
        date: parseDate(entry.published),
      })
    );
  } catch (error) {
    core.warning(
      `arXiv collection failed for ${sourceName}: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }
}

export { buildArxivQuery, buildArxivUrl, parseArxivFeed };
