import { setTimeout as sleep } from "node:timers/promises";
import * as core from "@actions/core";
import type { DigestConfig } from "../config.js";
import type { Paper } from "../sources/types.js";
import { responseText, type CompletionClient } from "./client.js";
import { fetchPageContent } from "./content.js";

const MAX_PROMPT_CONTENT = 2000;

function buildSummaryPrompt(paper: Paper, content: string): string {
  return `Based on this economics paper, provide ONE sentence (max 30 words) stating the key finding or takeaway. Be specific with numbers/percentages if available. Focus on the "so what" for policymakers.

Title: ${paper.title}

Abstract: ${paper.abstract}

Content excerpt: ${content.slice(0, MAX_PROMPT_CONTENT)}

Key finding (one sentence):`;
}

export interface SummarizeDeps {
  client?: CompletionClient;
  fetchContent?: (url: string) => Promise<string>;
}

async function summarizePaper(
  paper: Paper,
  config: DigestConfig,
  client: CompletionClient,
  fetchContent: (url: string) => Promise<string>
): Promise<string> {
  core.info(`  Summarizing: ${paper.title.slice(0, 50)}...`);
  const content = await fetchContent(paper.url);

  try {
    const message = await client.messages.create({
      model: config.summarization.model,
      max_tokens: config.summarization.max_tokens,
      messages: [{ role: "user", content: buildSummaryPrompt(paper, content) }],
    });
    return responseText(message).trim();
  } catch (error) {
    core.warning(
      `Summarization failed for "${paper.title}": ${error instanceof Error ? error.message : String(error)}`
    );
    return "";
  }
}

/**
 * Adds a one-sentence key finding to the first `limit` papers. Rank order
 * is kept; papers past the limit are returned untouched.
 */
export async function summarizePapers(
  papers: Paper[],
  config: DigestConfig,
  limit: number,
  deps: SummarizeDeps = {}
): Promise<Paper[]> {
  if (limit <= 0 || papers.length === 0) return papers;

  const { client } = deps;
  if (!client) {
    core.info("No ANTHROPIC_API_KEY found, skipping summaries");
    return papers;
  }

  const fetchContent = deps.fetchContent ?? ((url: string) => fetchPageContent(url));
  const count = Math.min(limit, papers.length);
  core.info(`Generating summaries for top ${count} papers...`);

  const enriched = [...papers];
  for (let i = 0; i < count; i++) {
    const keyFinding = await summarizePaper(
      papers[i],
      config,
      client,
      fetchContent
    );
    enriched[i] = { ...papers[i], keyFinding };

    if (i < count - 1 && config.summarization.request_delay_ms > 0) {
      await sleep(config.summarization.request_delay_ms);
    }
  }

  return enriched;
}

export { buildSummaryPrompt };
