import * as core from "@actions/core";
import Parser from "rss-parser";
import type { RssSourceConfig } from "../config.js";
import {
  createPaper,
  parseDate,
  toPlainText,
  USER_AGENT,
  type Paper,
} from "./types.js";

const FEED_TIMEOUT_MS = 15_000;

interface FeedItemFields {
  author?: string;
}

export type FeedParser = Pick<Parser<object, FeedItemFields>, "parseURL">;
export type FeedItem = FeedItemFields & Parser.Item;

export function createFeedParser(): FeedParser {
  return new Parser<object, FeedItemFields>({
    timeout: FEED_TIMEOUT_MS,
    headers: { "User-Agent": USER_AGENT },
    customFields: { item: ["author"] },
  });
}

export function itemToPaper(item: FeedItem, sourceName: string): Paper | null {
  if (!item.link || !item.title) return null;

  const rawAbstract = item.summary ?? item.contentSnippet ?? item.content ?? "";

  return createPaper({
    title: toPlainText(item.title),
    url: item.link,
    source: sourceName,
    authors: item.creator ?? item.author ?? "",
    abstract: toPlainText(rawAbstract),
    date: parseDate(item.isoDate ?? item.pubDate),
  });
}

export async function collectRss(
  sourceName: string,
  source: RssSourceConfig,
  parser: FeedParser = createFeedParser()
): Promise<Paper[]> {
  try {
    const feed = await parser.parseURL(source.url);
    const papers: Paper[] = [];

    for (const item of feed.items) {
      const paper = itemToPaper(item, sourceName);
      if (paper) papers.push(paper);
    }

    return papers;
  } catch (error) {
    core.warning(
      `Error parsing ${sourceName}: ${error instanceof Error ? error.message : String(error)}`
    );
    return [];
  }
}
