import type { Paper } from "../sources/types.js";

export interface RelevanceResult {
  score: number;
  matchedKeywords: string[];
}

const TITLE_WEIGHT = 3;
const BODY_WEIGHT = 1;

/** Lowercases keywords and drops repeats, keeping first-occurrence order. */
export function normalizeKeywords(keywords: string[]): string[] {
  return [...new Set(keywords.map((kw) => kw.trim().toLowerCase()))].filter(
    (kw) => kw.length > 0
  );
}

/**
 * Scores a title/abstract pair against the priority keywords.
 *
 * Matching is a plain substring test on lowercased text, so "tax" also
 * counts inside "taxation". A keyword found in the title is worth 3,
 * one found only in the abstract is worth 1.
 */
export function scoreRelevance(
  title: string,
  abstract: string,
  keywords: string[]
): RelevanceResult {
  const lowerTitle = title.toLowerCase();
  const searchText = `${lowerTitle} ${abstract.toLowerCase()}`;

  let score = 0;
  const matchedKeywords: string[] = [];

  for (const keyword of normalizeKeywords(keywords)) {
    if (!searchText.includes(keyword)) continue;
    matchedKeywords.push(keyword);
    score += lowerTitle.includes(keyword) ? TITLE_WEIGHT : BODY_WEIGHT;
  }

  return { score, matchedKeywords };
}

export function scorePaper(paper: Paper, keywords: string[]): Paper {
  const { score, matchedKeywords } = scoreRelevance(
    paper.title,
    paper.abstract,
    keywords
  );
  return { ...paper, relevanceScore: score, matchedKeywords };
}
