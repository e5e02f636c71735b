#!/usr/bin/env node
import * as core from "@actions/core";
import { loadConfig } from "./config.js";
import { parseCliArgs, resolveOptions, USAGE } from "./cli.js";
import { runPipeline } from "./pipeline.js";
import { collectAll, defaultCollectors } from "./sources/collect.js";
import { createCompletionClient } from "./summarizer/client.js";
import { summarizePapers } from "./summarizer/llm.js";
import { writeReport } from "./output/write.js";

async function run(): Promise<void> {
  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      core.info(USAGE);
      return;
    }

    core.info(`Loading config from ${args.config}`);
    const config = loadConfig(args.config);
    const options = resolveOptions(args, config, new Date());
    const client = createCompletionClient();
    const collectors = defaultCollectors(config, client);

    const result = await runPipeline(
      config,
      {
        collect: (cfg) => collectAll(cfg, collectors),
        summarize: (papers, cfg, limit) =>
          summarizePapers(papers, cfg, limit, { client }),
        output: writeReport,
      },
      options
    );

    core.info(
      `Done: ${result.papersRelevant} relevant of ${result.papersInWindow} papers, ${result.papersSummarized} summarized`
    );
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
