export interface Paper {
  title: string;
  authors: string;
  source: string;
  url: string;
  abstract: string;
  date: Date | null;
  relevanceScore: number;
  matchedKeywords: string[];
  keyFinding: string;
}

export const MAX_ABSTRACT_LENGTH = 500;

export const USER_AGENT = "Mozilla/5.0 (compatible; research aggregator)";

/** First `max` code points of `text`, so a cut never splits a surrogate pair. */
export function truncateCodePoints(text: string, max: number): string {
  if (text.length <= max) return text;
  const codePoints = Array.from(text);
  return codePoints.length <= max ? text : codePoints.slice(0, max).join("");
}

export interface PaperFields {
  title: string;
  url: string;
  source: string;
  authors?: string;
  abstract?: string;
  date?: Date | null;
}

export function createPaper(fields: PaperFields): Paper {
  return {
    title: fields.title,
    url: fields.url,
    source: fields.source,
    authors: fields.authors ?? "",
    abstract: truncateCodePoints(fields.abstract ?? "", MAX_ABSTRACT_LENGTH).trim(),
    date: fields.date ?? null,
    relevanceScore: 0,
    matchedKeywords: [],
    keyFinding: "",
  };
}

export function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

// Strips tags and collapses whitespace for feed summaries and page text.
export function toPlainText(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, " "))
    .replace(/\s+/g, " ")
    .trim();
}

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  mdash: "—",
  ndash: "–",
  hellip: "…",
  rsquo: "’",
  lsquo: "‘",
  rdquo: "”",
  ldquo: "“",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === "#") {
      const code =
        entity[1] === "x" || entity[1] === "X"
          ? parseInt(entity.slice(2), 16)
          : parseInt(entity.slice(1), 10);
      return Number.isNaN(code) || code > 0x10ffff
        ? match
        : String.fromCodePoint(code);
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}
