import * as core from "@actions/core";
import type {
  ArxivSourceConfig,
  DigestConfig,
  RssSourceConfig,
  ScrapeSourceConfig,
  SourceConfig,
} from "../config.js";
import type { CompletionClient } from "../summarizer/client.js";
import { collectArxiv } from "./arxiv.js";
import { collectListing } from "./listing.js";
import { collectRss } from "./rss.js";
import type { Paper } from "./types.js";

export interface SourceCollectors {
  rss: (name: string, source: RssSourceConfig) => Promise<Paper[]>;
  arxiv: (name: string, source: ArxivSourceConfig) => Promise<Paper[]>;
  scrape: (name: string, source: ScrapeSourceConfig) => Promise<Paper[]>;
}

export function defaultCollectors(
  config: DigestConfig,
  client?: CompletionClient
): SourceCollectors {
  const extractor = client
    ? { client, model: config.summarization.extraction_model }
    : undefined;
  return {
    rss: (name, source) => collectRss(name, source),
    arxiv: (name, source) => collectArxiv(name, source),
    scrape: (name, source) => collectListing(name, source, extractor),
  };
}

function collectOne(
  name: string,
  source: SourceConfig,
  collectors: SourceCollectors
): Promise<Paper[]> {
  switch (source.type) {
    case "rss":
      return collectors.rss(name, source);
    case "arxiv":
      return collectors.arxiv(name, source);
    case "scrape":
      return collectors.scrape(name, source);
  }
}

/**
 * Fetches every configured source in parallel. Results are concatenated
 * in configuration order, each source keeping its own item order.
 */
export async function collectAll(
  config: DigestConfig,
  collectors: SourceCollectors
): Promise<Paper[]> {
  const entries = Object.entries(config.sources);

  const results = await Promise.allSettled(
    entries.map(([name, source]) => {
      core.info(`Fetching: ${name}...`);
      return collectOne(name, source, collectors);
    })
  );

  const papers: Paper[] = [];

  results.forEach((result, i) => {
    const [name] = entries[i];
    if (result.status === "rejected") {
      core.warning(`Failed to collect ${name}: ${String(result.reason)}`);
      return;
    }
    core.info(`  ${name}: found ${result.value.length} items`);
    papers.push(...result.value);
  });

  return papers;
}
