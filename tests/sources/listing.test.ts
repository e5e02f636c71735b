import { describe, it, expect, vi } from "vitest";
import {
  cleanHtml,
  collectListing,
  extractFirstJsonArray,
  extractWithSelectors,
  resolveUrl,
} from "../../src/sources/listing.js";
import { USER_AGENT } from "../../src/sources/types.js";
import type { ListingSelectors, ScrapeSourceConfig } from "../../src/config.js";
import type { CompletionClient } from "../../src/summarizer/client.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
}));

const selectors: ListingSelectors = {
  item: ".paper-result, .result-item",
  title: ".title a, h3 a",
  authors: ".authors, .author",
  abstract: ".abstract, .description",
};

const source: ScrapeSourceConfig = {
  type: "scrape",
  url: "https://papers.example.com/listing",
  selectors,
};

const markupHtml = `<html><body>
<div class="paper-result">
  <h3><a href="/papers/10">  Housing
    Supply </a></h3>
  <div class="authors"> A. Smith,  B. Jones </div>
  <p class="abstract">We study supply.</p>
</div>
<div class="paper-result"><h3>No link here</h3></div>
<div class="result-item">
  <span class="title"><a href="https://other.example.com/11">Tax Incidence</a></span>
</div>
</body></html>`;

const listingHtml = `<html><head><style>.x{color:red}</style></head><body>
<nav>Menu</nav>
<div class="result"><a href="/papers/1">Rent <em>Control</em></a> A. Smith</div>
<script>track()</script>
<footer>Footer</footer>
</body></html>`;

const pageFetch = () =>
  vi.fn().mockResolvedValue({ ok: true, text: async () => listingHtml });

const modelReturning = (text: string) => {
  const create = vi.fn().mockResolvedValue({ content: [{ type: "text", text }] });
  const client: CompletionClient = { messages: { create } };
  return { extractor: { client, model: "test-extractor" }, create };
};

describe("cleanHtml", () => {
  it("drops boilerplate and turns anchors into markdown links", () => {
    expect(cleanHtml(listingHtml)).toBe("[Rent Control](/papers/1) A. Smith");
  });

  it("truncates to 15000 characters", () => {
    expect(cleanHtml("x".repeat(20_000))).toHaveLength(15_000);
  });
});

describe("extractFirstJsonArray", () => {
  it("extracts entries from surrounding prose", () => {
    const text =
      'Here you go:\n[{"title":"Paper 1","url":"https://example.com/1","authors":"Ann"}]\nDone.';
    expect(extractFirstJsonArray(text)).toEqual([
      { title: "Paper 1", url: "https://example.com/1", authors: "Ann", abstract: "" },
    ]);
  });

  it("skips entries missing a title or url", () => {
    const text = '[{"title":"Ok","url":"/ok"},{"title":"No url"},{"url":"/no-title"},42]';
    expect(extractFirstJsonArray(text)).toEqual([
      { title: "Ok", url: "/ok", authors: "", abstract: "" },
    ]);
  });

  it("ignores brackets inside string values", () => {
    const text = '[{"title":"Returns on (0,1] intervals","url":"/p/1"}]';
    expect(extractFirstJsonArray(text)).toEqual([
      { title: "Returns on (0,1] intervals", url: "/p/1", authors: "", abstract: "" },
    ]);
  });

  it("handles escaped quotes next to brackets", () => {
    const text = '[{"title":"The \\"[x]\\" puzzle","url":"/q"}]';
    expect(extractFirstJsonArray(text)).toEqual([
      { title: 'The "[x]" puzzle', url: "/q", authors: "", abstract: "" },
    ]);
  });

  it("skips bracketed prose before the array", () => {
    const text =
      'Entries [2 found]:\n[{"title":"A","url":"/a"},{"title":"B","url":"/b"}]';
    expect(extractFirstJsonArray(text).map((e) => e.title)).toEqual(["A", "B"]);
  });

  it("skips a leading array that holds no objects", () => {
    const text = 'See note [1].\n[{"title":"A","url":"/a"}]';
    expect(extractFirstJsonArray(text).map((e) => e.title)).toEqual(["A"]);
  });

  it("returns an empty list when no array is present", () => {
    expect(extractFirstJsonArray("nothing here")).toEqual([]);
  });
});

describe("extractWithSelectors", () => {
  it("reads title, link, authors and abstract from each matching item", () => {
    expect(extractWithSelectors(markupHtml, selectors)).toEqual([
      {
        title: "Housing Supply",
        url: "/papers/10",
        authors: "A. Smith, B. Jones",
        abstract: "We study supply.",
      },
      {
        title: "Tax Incidence",
        url: "https://other.example.com/11",
        authors: "",
        abstract: "",
      },
    ]);
  });

  it("finds nothing when the markup has no matching items", () => {
    expect(extractWithSelectors(listingHtml, selectors)).toEqual([]);
  });
});

describe("resolveUrl", () => {
  it("resolves relative links against the page", () => {
    expect(resolveUrl("https://papers.example.com/listing", "/papers/1")).toBe(
      "https://papers.example.com/papers/1"
    );
  });

  it("keeps absolute links", () => {
    expect(resolveUrl("https://papers.example.com/", "https://other.example.com/a")).toBe(
      "https://other.example.com/a"
    );
  });
});

describe("collectListing", () => {
  it("extracts papers with selectors when no model client is available", async () => {
    const fetchFn = vi.fn().mockResolvedValue({ ok: true, text: async () => markupHtml });

    const papers = await collectListing("Working Papers", source, undefined, fetchFn);

    expect(fetchFn).toHaveBeenCalledWith(
      "https://papers.example.com/listing",
      expect.objectContaining({ headers: { "User-Agent": USER_AGENT } })
    );
    expect(papers).toEqual([
      {
        title: "Housing Supply",
        url: "https://papers.example.com/papers/10",
        source: "Working Papers",
        authors: "A. Smith, B. Jones",
        abstract: "We study supply.",
        date: null,
        relevanceScore: 0,
        matchedKeywords: [],
        keyFinding: "",
      },
      {
        title: "Tax Incidence",
        url: "https://other.example.com/11",
        source: "Working Papers",
        authors: "",
        abstract: "",
        date: null,
        relevanceScore: 0,
        matchedKeywords: [],
        keyFinding: "",
      },
    ]);
  });

  it("does not call the model when selectors match", async () => {
    const { extractor, create } = modelReturning("[]");
    const fetchFn = vi.fn().mockResolvedValue({ ok: true, text: async () => markupHtml });

    const papers = await collectListing("Working Papers", source, extractor, fetchFn);

    expect(papers).toHaveLength(2);
    expect(create).not.toHaveBeenCalled();
  });

  it("falls back to the configured model when selectors find nothing", async () => {
    const { extractor, create } = modelReturning(
      JSON.stringify([
        { title: "Rent Control", url: "/papers/1", authors: "A. Smith", abstract: "We study rents." },
        { title: "", url: "/papers/2" },
        { title: "Elsewhere", url: "https://other.example.com/3" },
      ])
    );

    const papers = await collectListing("Working Papers", source, extractor, pageFetch());

    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: "test-extractor" })
    );
    expect(papers).toEqual([
      {
        title: "Rent Control",
        url: "https://papers.example.com/papers/1",
        source: "Working Papers",
        authors: "A. Smith",
        abstract: "We study rents.",
        date: null,
        relevanceScore: 0,
        matchedKeywords: [],
        keyFinding: "",
      },
      {
        title: "Elsewhere",
        url: "https://other.example.com/3",
        source: "Working Papers",
        authors: "",
        abstract: "",
        date: null,
        relevanceScore: 0,
        matchedKeywords: [],
        keyFinding: "",
      },
    ]);
  });

  it("keeps at most twenty entries", async () => {
    const entries = Array.from({ length: 25 }, (_, i) => ({
      title: `Paper ${i}`,
      url: `/papers/${i}`,
    }));
    const { extractor } = modelReturning(JSON.stringify(entries));

    const papers = await collectListing("Working Papers", source, extractor, pageFetch());
    expect(papers).toHaveLength(20);
    expect(papers[19].title).toBe("Paper 19");
  });

  it("returns no papers when selectors find nothing and no client is available", async () => {
    const fetchFn = pageFetch();
    expect(await collectListing("Working Papers", source, undefined, fetchFn)).toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("returns no papers on an HTTP error", async () => {
    const { extractor, create } = modelReturning("[]");
    const fetchFn = vi.fn().mockResolvedValue({ ok: false, status: 403 });

    expect(await collectListing("Working Papers", source, extractor, fetchFn)).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("returns no papers when the model call fails", async () => {
    const client: CompletionClient = {
      messages: { create: vi.fn().mockRejectedValue(new Error("overloaded")) },
    };

    expect(
      await collectListing("Working Papers", source, { client, model: "test-extractor" }, pageFetch())
    ).toEqual([]);
  });

  it("returns no papers when the model reply is malformed", async () => {
    const { extractor } = modelReturning('[{"title": "broken"');
    expect(await collectListing("Working Papers", source, extractor, pageFetch())).toEqual([]);
  });
});
