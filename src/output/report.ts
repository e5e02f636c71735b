import { truncateCodePoints, type Paper } from "../sources/types.js";

export const HIGH_PRIORITY_MIN_SCORE = 5;
export const WORTH_READING_MIN_SCORE = 2;
export const ALSO_RELEVANT_MIN_SCORE = 1;

const MAX_AUTHORS_LENGTH = 60;
const MAX_ABSTRACT_PREVIEW = 300;
const MAX_KEYWORDS_PER_PAPER = 5;

const EMPTY_DIGEST_LINE =
  "*No highly relevant papers found this period. Consider expanding keywords or timeframe.*";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export interface ReportContext {
  title: string;
  days: number;
  generatedAt: Date;
  totalScanned: number;
  sourceCount: number;
  maxPerTier: number;
  topKeywords: number;
}

export interface Tiers {
  high: Paper[];
  medium: Paper[];
  other: Paper[];
}

export function groupByTier(papers: Paper[]): Tiers {
  return {
    high: papers.filter((p) => p.relevanceScore >= HIGH_PRIORITY_MIN_SCORE),
    medium: papers.filter(
      (p) =>
        p.relevanceScore >= WORTH_READING_MIN_SCORE &&
        p.relevanceScore < HIGH_PRIORITY_MIN_SCORE
    ),
    other: papers.filter(
      (p) =>
        p.relevanceScore >= ALSO_RELEVANT_MIN_SCORE &&
        p.relevanceScore < WORTH_READING_MIN_SCORE
    ),
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** "Oct 05" */
export function formatShortDate(date: Date | null): string {
  if (!date) return "Recent";
  return `${MONTHS[date.getUTCMonth()].slice(0, 3)} ${pad2(date.getUTCDate())}`;
}

/** "October 05, 2026" */
export function formatLongDate(date: Date): string {
  return `${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

export function truncateAuthors(authors: string): string {
  const cut = truncateCodePoints(authors, MAX_AUTHORS_LENGTH);
  return cut === authors ? authors : `${cut}...`;
}

export function truncateAbstract(abstract: string): string {
  const chars = Array.from(abstract);
  if (chars.length <= MAX_ABSTRACT_PREVIEW) return abstract;

  const cut = chars.slice(0, MAX_ABSTRACT_PREVIEW).join("");
  // The cut already ends on a word when the next character is whitespace.
  if (/\s/.test(chars[MAX_ABSTRACT_PREVIEW])) return `${cut.trimEnd()}...`;

  const lastSpace = cut.lastIndexOf(" ");
  const wholeWords = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  return `${wholeWords.trimEnd()}...`;
}

export function formatPaper(paper: Paper): string {
  const lines = [
    `**[${paper.title}](${paper.url})**`,
    `*${paper.source}* | ${truncateAuthors(paper.authors)} | ${formatShortDate(paper.date)}`,
  ];

  if (paper.keyFinding) {
    lines.push(`**📌 Key finding:** ${paper.keyFinding}`);
  } else if (paper.abstract) {
    lines.push(`> ${truncateAbstract(paper.abstract)}`);
  }

  const keywords = paper.matchedKeywords.slice(0, MAX_KEYWORDS_PER_PAPER);
  if (keywords.length > 0) {
    lines.push(`**Keywords:** ${keywords.join(", ")}`);
  }

  return `${lines.join("\n")}\n\n`;
}

// Map iteration follows insertion order, and the sort is stable, so ties
// keep the order in which keywords were first seen.
export function countKeywords(
  papers: Paper[],
  limit: number
): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const paper of papers) {
    for (const kw of paper.matchedKeywords) {
      counts.set(kw, (counts.get(kw) ?? 0) + 1);
    }
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function renderTier(heading: string, papers: Paper[], cap: number): string {
  if (papers.length === 0) return "";
  return `### ${heading}\n\n${papers.slice(0, cap).map(formatPaper).join("")}`;
}

export function renderReport(papers: Paper[], context: ReportContext): string {
  let output = `# ${context.title}
**Week of ${formatLongDate(context.generatedAt)}** | Papers from last ${context.days} days

---

## Top Papers by Relevance

`;

  if (papers.length === 0) {
    return `${output}${EMPTY_DIGEST_LINE}\n`;
  }

  const tiers = groupByTier(papers);
  const sections = [
    renderTier("🔴 High Priority", tiers.high, context.maxPerTier),
    renderTier("🟡 Worth Reading", tiers.medium, context.maxPerTier),
    renderTier("🟢 Also Relevant", tiers.other, context.maxPerTier),
  ].filter((section) => section.length > 0);

  output += sections.join("\n");

  output += `
---

## Summary

- **Total papers scanned:** ${context.totalScanned}
- **Relevant papers found:** ${papers.length}
- **High priority:** ${tiers.high.length}
- **Sources checked:** ${context.sourceCount}

### Keywords Matched This Week
`;

  for (const [kw, count] of countKeywords(papers, context.topKeywords)) {
    output += `- ${kw}: ${count} papers\n`;
  }

  return output;
}
