import { describe, expect, test } from "vitest";
import {
  decodeHtmlEntities,
  normalizeEntityQuoting,
  normalizeText,
  normalizeUnicode,
  normalizeWhitespace,
  stripControlChars,
  stripHtmlWhitespace,
} from "../src/text/normalize.js";

describe("normalizeUnicode", () => {
  test("folds typographic symbols after NFKC", () => {
    expect(normalizeUnicode("\u201cQuoted\u201d \u2014 caf\u00e9")).toBe('"Quoted" -- caf\u00e9');
  });

  test("expands compatibility ligatures", () => {
    expect(normalizeUnicode("\ufb01ne")).toBe("fine");
  });

  test("maps currency and legal signs to ASCII words", () => {
    expect(normalizeUnicode("\u00a9 2024, 5\u20ac")).toBe("(C) 2024, 5EUR");
  });
});

describe("stripControlChars", () => {
  test("keeps tabs and newlines but drops controls and separators", () => {
    expect(stripControlChars("a\u0000b\tc\u2028d\ne")).toBe("ab\tcd\ne");
  });

  test("drops zero-width format characters", () => {
    expect(stripControlChars("zero\u200bwidth")).toBe("zerowidth");
  });
});

describe("normalizeWhitespace", () => {
  test("collapses runs and trims", () => {
    expect(normalizeWhitespace("  one \n\t two  ")).toBe("one two");
  });
});

describe("normalizeText", () => {
  test("applies fold, strip and collapse", () => {
    expect(normalizeText("  Hello\u00a0\u00a0world\u200b  ")).toBe("Hello world");
  });

  test("replaces lone surrogates", () => {
    expect(normalizeText("a\ud800b")).toBe("a\ufffdb");
  });

  test("returns empty string for whitespace-only input", () => {
    expect(normalizeText(" \n\t ")).toBe("");
  });
});

describe("decodeHtmlEntities", () => {
  test("decodes named and numeric references", () => {
    expect(decodeHtmlEntities("Fish &amp; chips &lt;3 &#65;&#x42; &bogus;")).toBe(
      "Fish & chips <3 AB &bogus;"
    );
  });

  test("decodes a non-breaking space to U+00A0", () => {
    expect(decodeHtmlEntities("a&nbsp;b")).toBe("a\u00a0b");
  });

  test("leaves invalid code points untouched", () => {
    expect(decodeHtmlEntities("&#0; &#xD800;")).toBe("&#0; &#xD800;");
  });
});

describe("stripHtmlWhitespace", () => {
  test("removes whitespace between tags only", () => {
    expect(stripHtmlWhitespace("  <p>a b</p>\n  <p>c</p> ")).toBe("<p>a b</p><p>c</p>");
  });
});

describe("normalizeEntityQuoting", () => {
  test("unescapes quotes in text runs but not in attributes", () => {
    expect(
      normalizeEntityQuoting('<p title="&quot;x&quot;">say &quot;hi&quot; &#39;you&#39;</p>')
    ).toBe(`<p title="&quot;x&quot;">say "hi" 'you'</p>`);
  });
});
