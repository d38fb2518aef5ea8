import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ExtractionCaches } from "../src/cache/extraction-caches.js";
import { HtmlDocument } from "../src/dom/html-document.js";
import { ExhaustedFallbackError, RetryExhaustedError, StructureError, TimeoutError } from "../src/errors.js";
import { extractArticle, extractArticles } from "../src/extract/article.js";

const HEAD =
  '<title>Test Story</title><meta name="author" content="Jane Doe">' +
  '<meta property="article:published_time" content="2020-02-03T04:05:06Z">';

const ARTICLE =
  `<html><head>${HEAD}</head><body>` +
  '<div id="nav"><a href="/">Home</a></div>' +
  '<div id="content"><h1>Test Story</h1><p>First paragraph of the story.</p><p>Second <b>bold</b> paragraph.</p></div>' +
  "</body></html>";

const FRAMESET = "<html><frameset><frame></frameset></html>";

function page(body: string): string {
  return `<html><head></head><body>${body}</body></html>`;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("extractArticle", () => {
  test("returns simplified content, text blocks and metadata", async () => {
    const article = await extractArticle(ARTICLE);
    expect(article).toEqual({
      title: "Test Story",
      byline: "Jane Doe",
      date: "2020-02-03T04:05:06Z",
      content: page(
        "<div><h1>Test Story</h1><p>First paragraph of the story.</p><p>Second bold paragraph.</p></div>"
      ),
      plainText: [
        { text: "Test Story" },
        { text: "First paragraph of the story." },
        { text: "Second bold paragraph." },
      ],
      mainContentTier: "candidate",
      degraded: false,
    });
  });

  test("applies the site rules of the source url", async () => {
    const html =
      `<html><head>${HEAD}</head><body>` +
      '<div id="mw-panel">Tools and links</div>' +
      '<div id="content"><p>Article body text here.</p><span class="mw-editsection">[edit]</span></div>' +
      "</body></html>";
    const article = await extractArticle({ html, url: "https://en.wikipedia.org/wiki/Test" });
    expect(article.content).toBe(page("<div><p>Article body text here.</p></div>"));
    expect(article.title).toBe("Test Story");
  });

  test("stamps digests and indexes when asked", async () => {
    const article = await extractArticle(ARTICLE, { addNodeIndexes: true, addContentDigests: true });
    expect(article.content).toContain('<p data-content-digest="');
    expect(article.plainText.map((block) => block.nodeIndex)).toEqual(["0.1.1", "0.1.2", "0.1.3"]);
  });

  test("does not retry a document without a body", async () => {
    const parse = vi.fn((html: string) => HtmlDocument.parse(html));
    await expect(extractArticle(FRAMESET, { retries: 3 }, { parse })).rejects.toBeInstanceOf(StructureError);
    expect(parse).toHaveBeenCalledTimes(1);
  });

  test("gives up on input the parser rejects even after repair", async () => {
    await expect(extractArticle("<p>a\u0000b</p>")).rejects.toBeInstanceOf(ExhaustedFallbackError);
  });

  test("retries timeouts with backoff and then reports exhaustion", async () => {
    const delays: number[] = [];
    const slowParse = (html: string) => {
      const until = Date.now() + 5;
      while (Date.now() < until) continue;
      return HtmlDocument.parse(html);
    };
    const error = await extractArticle(
      ARTICLE,
      { timeoutMs: 1, retries: 1, retryBaseDelayMs: 50 },
      {
        parse: slowParse,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.attempts).toBe(2);
    expect(error.lastError).toBeInstanceOf(TimeoutError);
    expect(delays).toEqual([50]);
  });

  test("reuses cached parses and locations", async () => {
    const caches = new ExtractionCaches({ sweepIntervalMs: 0 });
    try {
      const first = await extractArticle(ARTICLE, {}, { caches });
      const second = await extractArticle(ARTICLE, {}, { caches });
      expect(second).toEqual(first);
      expect(caches.stats().documents.hits).toBe(1);
      expect(caches.stats().located.hits).toBe(1);
    } finally {
      caches.close();
    }
  });
});

describe("extractArticle with shared caches", () => {
  test("honours the scan threshold of each call", async () => {
    const html = page("<div><p>Just a few words here in this div.</p></div>");
    const caches = new ExtractionCaches({ sweepIntervalMs: 0 });
    try {
      const loose = await extractArticle(html, { minScanTextLength: 10 }, { caches });
      const strict = await extractArticle(html, { minScanTextLength: 1000 }, { caches });
      expect([loose.mainContentTier, strict.mainContentTier]).toEqual(["scan", "body"]);
    } finally {
      caches.close();
    }
  });

  test("passes pipeline stage options through", async () => {
    const article = await extractArticle(ARTICLE, { pipeline: { attributeAllowlist: ["id"] } });
    expect(article.content).toBe(
      page(
        '<div id="content"><h1>Test Story</h1><p>First paragraph of the story.</p><p>Second bold paragraph.</p></div>'
      )
    );
  });
});

describe("extractArticles", () => {
  test("reports each document separately, in input order", async () => {
    const results = await extractArticles([ARTICLE, FRAMESET, { html: ARTICLE }]);
    expect(results.map((result) => result.ok)).toEqual([true, false, true]);
    const failed = results[1];
    if (failed && !failed.ok) expect(failed.error).toBeInstanceOf(StructureError);
    const succeeded = results[0];
    if (succeeded?.ok) expect(succeeded.article.title).toBe("Test Story");
  });
});
