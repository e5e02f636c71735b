import * as core from "@actions/core";
import type { DigestConfig } from "./config.js";
import { filterByCutoff, lookbackCutoff } from "./filter/cutoff.js";
import { rankPapers } from "./filter/rank.js";
import { scorePaper } from "./filter/relevance.js";
import { renderReport } from "./output/report.js";
import type { Paper } from "./sources/types.js";

export interface DigestOptions {
  days: number;
  minScore: number;
  summarize: number;
  outputPath: string;
  now: Date;
}

export interface PipelineResult {
  papersFound: number;
  papersInWindow: number;
  papersRelevant: number;
  papersSummarized: number;
  report: string;
}

export interface PipelineDeps {
  collect: (config: DigestConfig) => Promise<Paper[]>;
  summarize: (
    papers: Paper[],
    config: DigestConfig,
    limit: number
  ) => Promise<Paper[]>;
  output: (report: string, outputPath: string) => Promise<void>;
}

export async function runPipeline(
  config: DigestConfig,
  deps: PipelineDeps,
  options: DigestOptions
): Promise<PipelineResult> {
  core.info(`Stage 1/5: Collecting papers from last ${options.days} days...`);
  const collected = await deps.collect(config);
  core.info(`  Found ${collected.length} papers`);

  core.info("Stage 2/5: Applying lookback window...");
  const cutoff = lookbackCutoff(options.now, options.days);
  const inWindow = filterByCutoff(collected, cutoff);
  core.info(`  ${inWindow.length} papers since ${cutoff.toISOString()}`);

  core.info("Stage 3/5: Scoring and ranking...");
  const scored = inWindow.map((p) => scorePaper(p, config.keywords));
  const ranked = rankPapers(scored, options.minScore);
  core.info(
    `  Found ${ranked.papers.length} relevant papers out of ${ranked.totalScanned} total`
  );

  core.info("Stage 4/5: Summarizing top papers...");
  const summarized = await deps.summarize(
    ranked.papers,
    config,
    options.summarize
  );
  const papersSummarized = summarized.filter((p) => p.keyFinding).length;
  core.info(`  ${papersSummarized} key findings added`);

  core.info("Stage 5/5: Writing digest...");
  const report = renderReport(summarized, {
    title: config.title,
    days: options.days,
    generatedAt: options.now,
    totalScanned: ranked.totalScanned,
    sourceCount: Object.keys(config.sources).length,
    maxPerTier: config.digest.max_per_tier,
    topKeywords: config.digest.top_keywords,
  });
  await deps.output(report, options.outputPath);

  return {
    papersFound: collected.length,
    papersInWindow: inWindow.length,
    papersRelevant: ranked.papers.length,
    papersSummarized,
    report,
  };
}
