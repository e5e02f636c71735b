import type { Paper } from "../sources/types.js";

export interface RankedPapers {
  papers: Paper[];
  /** Records considered before the minimum-score filter. */
  totalScanned: number;
}

// Array.prototype.sort is stable, so equal scores keep source order.
export function rankPapers(papers: Paper[], minScore: number): RankedPapers {
  const relevant = papers
    .filter((p) => p.relevanceScore >= minScore)
    .sort((a, b) => b.relevanceScore - a.relevanceScore);

  return { papers: relevant, totalScanned: papers.length };
}
