import * as core from "@actions/core";
import {
  toPlainText,
  truncateCodePoints,
  USER_AGENT,
} from "../sources/types.js";

const MAX_CONTENT_LENGTH = 3000;
const CONTENT_TIMEOUT_MS = 10_000;

const BOILERPLATE_TAGS = ["script", "style", "nav", "header", "footer", "aside"];
const CONTAINER_TAGS = ["article", "main", "body"];

function stripBoilerplate(html: string): string {
  let text = html.replace(/<!--[\s\S]*?-->/g, "");
  for (const tag of BOILERPLATE_TAGS) {
    text = text.replace(new RegExp(`<${tag}\\b[\\s\\S]*?<\\/${tag}>`, "gi"), " ");
  }
  return text;
}

function innerHtml(html: string, tag: string): string | null {
  const match = new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`, "i").exec(
    html
  );
  return match ? match[1] : null;
}

/** Main text of an article page, preferring <article>, then <main>, then <body>. */
export function extractMainText(html: string): string {
  const cleaned = stripBoilerplate(html);

  for (const tag of CONTAINER_TAGS) {
    const inner = innerHtml(cleaned, tag);
    if (inner !== null) {
      const text = toPlainText(inner);
      if (text) return truncateCodePoints(text, MAX_CONTENT_LENGTH);
    }
  }

  return truncateCodePoints(toPlainText(cleaned), MAX_CONTENT_LENGTH);
}

export async function fetchPageContent(
  url: string,
  fetchFn: typeof fetch = fetch
): Promise<string> {
  try {
    const response = await fetchFn(url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(CONTENT_TIMEOUT_MS),
    });
    if (!response.ok) {
      core.warning(`Could not fetch ${url}: HTTP ${response.status}`);
      return "";
    }
    return extractMainText(await response.text());
  } catch (error) {
    core.warning(
      `Could not fetch ${url}: ${error instanceof Error ? error.message : String(error)}`
    );
    return "";
  }
}
