import type { Paper } from "../sources/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function lookbackCutoff(now: Date, days: number): Date {
  if (!Number.isInteger(days) || days < 0) {
    throw new Error(`Invalid lookback window: ${days}`);
  }
  return new Date(now.getTime() - days * DAY_MS);
}

// Undated records pass through: the source could not say how old they are.
export function filterByCutoff(papers: Paper[], cutoff: Date): Paper[] {
  return papers.filter(
    (p) => p.date === null || p.date.getTime() >= cutoff.getTime()
  );
}
