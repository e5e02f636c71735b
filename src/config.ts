import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { normalizeKeywords } from "./filter/relevance.js";

const RssSourceSchema = z.object({
  type: z.literal("rss"),
  url: z.string().url(),
});

const ListingSelectorsSchema = z.object({
  item: z.string().min(1).default(".paper-result, .result-item"),
  title: z.string().min(1).default(".title a, h3 a"),
  authors: z.string().min(1).default(".authors, .author"),
  abstract: z.string().min(1).default(".abstract, .description"),
});

const ScrapeSourceSchema = z.object({
  type: z.literal("scrape"),
  url: z.string().url(),
  selectors: ListingSelectorsSchema.default({}),
});

const ArxivSourceSchema = z.object({
  type: z.literal("arxiv"),
  categories: z.array(z.string().min(1)).min(1),
  max_results: z.number().int().positive().max(200).default(50),
});

const SourceSchema = z.discriminatedUnion("type", [
  RssSourceSchema,
  ScrapeSourceSchema,
  ArxivSourceSchema,
]);

const DigestSchema = z.object({
  lookback_days: z.number().int().positive().default(7),
  min_score: z.number().int().nonnegative().default(1),
  max_per_tier: z.number().int().positive().default(10),
  top_keywords: z.number().int().positive().default(15),
});

const SummarizationSchema = z.object({
  model: z.string().min(1).default("claude-sonnet-4-20250514"),
  extraction_model: z.string().min(1).default("claude-3-5-haiku-20241022"),
  max_papers: z.number().int().nonnegative().default(15),
  max_tokens: z.number().int().positive().default(100),
  request_delay_ms: z.number().int().nonnegative().default(500),
});

export const DigestConfigSchema = z.object({
  title: z.string().min(1).default("Economics Research Digest"),
  keywords: z
    .array(z.string().trim().min(1))
    .min(1, "At least one keyword must be configured")
    .transform(normalizeKeywords),
  sources: z
    .record(z.string().min(1), SourceSchema)
    .refine(
      (s) => Object.keys(s).length > 0,
      "At least one source must be configured"
    ),
  digest: DigestSchema.default({}),
  summarization: SummarizationSchema.default({}),
});

export type DigestConfig = z.infer<typeof DigestConfigSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type RssSourceConfig = z.infer<typeof RssSourceSchema>;
export type ScrapeSourceConfig = z.infer<typeof ScrapeSourceSchema>;
export type ListingSelectors = z.infer<typeof ListingSelectorsSchema>;
export type ArxivSourceConfig = z.infer<typeof ArxivSourceSchema>;

export function parseConfig(yamlContent: string): DigestConfig {
  const raw: unknown = parseYaml(yamlContent);
  return DigestConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): DigestConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
