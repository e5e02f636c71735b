import { parseArgs } from "node:util";
import { z } from "zod";
import type { DigestConfig } from "./config.js";
import type { DigestOptions } from "./pipeline.js";
import { defaultOutputPath } from "./output/write.js";

export const DEFAULT_CONFIG_PATH = "digest.config.yml";

export const USAGE = `Usage: econ-digest [options]

Options:
  --config <path>     Config file (default: ${DEFAULT_CONFIG_PATH})
  --days <n>          Days to look back (default: 7)
  --min-score <n>     Minimum relevance score (default: 1)
  --output <path>     Output file path (default: econ_digest_YYYYMMDD.md)
  --summarize <n>     Number of top papers to summarize, 0 disables (default: 15)
  -h, --help          Show this help`;

const count = z.coerce.number().int().nonnegative();

const CliArgsSchema = z.object({
  config: z.string().min(1).default(DEFAULT_CONFIG_PATH),
  days: z.coerce.number().int().positive().optional(),
  "min-score": count.optional(),
  output: z.string().min(1).optional(),
  summarize: count.optional(),
  help: z.boolean().default(false),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string" },
      days: { type: "string" },
      "min-score": { type: "string" },
      output: { type: "string" },
      summarize: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  });
  return CliArgsSchema.parse(values);
}

/** Flags win over the config file's defaults. */
export function resolveOptions(
  args: CliArgs,
  config: DigestConfig,
  now: Date
): DigestOptions {
  return {
    days: args.days ?? config.digest.lookback_days,
    minScore: args["min-score"] ?? config.digest.min_score,
    summarize: args.summarize ?? config.summarization.max_papers,
    outputPath: args.output ?? defaultOutputPath(now),
    now,
  };
}
