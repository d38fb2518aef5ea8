import type { HtmlDocument } from "../dom/html-document.js";
import { hasTimeOfDay, parseFlexibleDate, parseIsoDate } from "./dates.js";
import { bestExtracted, extractElement, type ExtractedElements, type SelectorScore } from "./element.js";
import { extractReadableFields } from "./readability.js";

export type ArticleMetadata = {
  title: string;
  byline: string;
  date: string;
};

const TITLE_SELECTORS: readonly SelectorScore[] = [
  { selector: "h1.entry-title", score: 6 },
  { selector: "h1[itemprop='headline']", score: 5 },
  { selector: "header.entry-header > h1.entry-title", score: 4 },
  { selector: "meta[property='og:title']", score: 3, attribute: "content" },
  { selector: "h2[itemprop='headline']", score: 2 },
  { selector: "meta[itemprop*='headline']", score: 2, attribute: "content" },
  { selector: "meta[property='twitter:title']", score: 2, attribute: "content" },
  { selector: "meta[name='twitter:title']", score: 2, attribute: "content" },
  { selector: "meta[property='article:title']", score: 2, attribute: "content" },
  { selector: "div.postarea > h2 > a", score: 1 },
  { selector: "h1.post__title", score: 1 },
  { selector: "h1.title", score: 1 },
  { selector: "header > h1", score: 1 },
  { selector: "meta[name='dcterms.title']", score: 1, attribute: "content" },
  { selector: "meta[name='fb_title']", score: 1, attribute: "content" },
  { selector: "meta[name='sailthru.title']", score: 1, attribute: "content" },
  { selector: "meta[name='title']", score: 1, attribute: "content" },
  { selector: "h1", score: 1 },
  { selector: "h2", score: 1 },
  { selector: "div[class*='title']", score: 1 },
  { selector: "div[id*='title']", score: 1 },
  { selector: "title", score: 0 },
];

const BYLINE_SELECTORS: readonly SelectorScore[] = [
  { selector: "meta[property='article:author']", score: 10, attribute: "content" },
  { selector: "meta[property='og:article:author']", score: 9, attribute: "content" },
  { selector: "meta[name='author']", score: 8, attribute: "content" },
  { selector: "meta[name='sailthru.author']", score: 7, attribute: "content" },
  { selector: "meta[name='byl']", score: 6, attribute: "content" },
  { selector: "meta[name='twitter:creator']", score: 5, attribute: "content" },
  { selector: "meta[property='book:author']", score: 4, attribute: "content" },
  { selector: "meta[name='dc.creator']", score: 3, attribute: "content" },
  { selector: "meta[name='dcterms.creator']", score: 3, attribute: "content" },
  { selector: "a[rel='author']", score: 2 },
  { selector: "[itemprop='author']", score: 1 },
  { selector: "span[class*='author'], p[class*='author'], div[class*='author']", score: 1 },
  { selector: "span[class*='byline'], p[class*='byline'], div[class*='byline']", score: 1 },
];

const METADATA_DATE_SELECTORS: readonly SelectorScore[] = [
  { selector: "meta[property='article:published_time']", score: 13, attribute: "content" },
  { selector: "meta[property='og:updated_time']", score: 10, attribute: "content" },
  { selector: "meta[property='og:article:published_time']", score: 10, attribute: "content" },
  { selector: "meta[property='og:article:modified_time']", score: 10, attribute: "content" },
  { selector: "meta[name='pubdate']", score: 10, attribute: "content" },
  { selector: "meta[name='publishdate']", score: 10, attribute: "content" },
  { selector: "meta[name='date']", score: 9, attribute: "content" },
  { selector: "meta[property='article:published']", score: 7, attribute: "content" },
  { selector: "meta[itemprop='datePublished']", score: 3, attribute: "content" },
  { selector: "time[datetime]", score: 3, attribute: "datetime" },
  { selector: "meta[itemprop='dateModified']", score: 2, attribute: "content" },
  { selector: "meta[property='article:modified_time']", score: 2, attribute: "content" },
  { selector: "meta[name='DC.date.issued']", score: 2, attribute: "content" },
  { selector: "meta[name='DC.date.created']", score: 2, attribute: "content" },
  { selector: "meta[name='DC.date.modified']", score: 1, attribute: "content" },
  { selector: "meta[name='dcterms.modified']", score: 1, attribute: "content" },
  { selector: "meta[name='dcterms.created']", score: 1, attribute: "content" },
];

const VISIBLE_DATE_SELECTORS: readonly SelectorScore[] = [
  { selector: "span.date, span.time, span.timestamp, span.published", score: 3 },
  { selector: "time", score: 2 },
  { selector: "span[class*='date'], div[class*='date'], p[class*='date'], p[class*='time']", score: 2 },
  { selector: "div[class*='byline'], p[class*='byline']", score: 1 },
  { selector: "[class*='dateline']", score: 1 },
];

const BYLINE_PREFIXES = ["by ", "author: ", "written by ", "posted by ", "published by ", "reported by "];
const BYLINE_SUFFIXES = [" | Author", " | Writer", " | Reporter", " | Staff"];

function countUppercase(value: string): number {
  return (value.match(/\p{Lu}/gu) ?? []).length;
}

/**
 * A title contained in a longer candidate also earns that candidate's score, and of two
 * candidates equal up to case the one with more capitals earns the other's.
 */
export function combineSimilarTitles(extracted: ExtractedElements): ExtractedElements {
  const initial = new Map([...extracted].map(([title, entry]): [string, number] => [title, entry.score]));
  const titles = [...initial.keys()].sort();
  for (const title of titles) {
    const entry = extracted.get(title);
    if (!entry) continue;
    for (const other of titles) {
      if (other === title) continue;
      const otherScore = initial.get(other) ?? 0;
      const otherEntry = extracted.get(other);
      const contained = title.length < other.length && other.includes(title);
      const sameIgnoringCase =
        title.toLowerCase() === other.toLowerCase() && countUppercase(title) > countUppercase(other);
      if ((contained || sameIgnoringCase) && otherEntry) {
        entry.score += otherScore;
        entry.selectors = [...entry.selectors, ...otherEntry.selectors].sort();
      }
    }
  }
  return extracted;
}

export function extractTitle(doc: HtmlDocument): string {
  return bestExtracted(extractElement(doc, TITLE_SELECTORS, combineSimilarTitles));
}

export function cleanByline(raw: string): string {
  let byline = raw.trim();
  for (const prefix of BYLINE_PREFIXES) {
    if (byline.toLowerCase().startsWith(prefix)) byline = byline.slice(prefix.length).trim();
  }
  for (const suffix of BYLINE_SUFFIXES) {
    if (byline.endsWith(suffix)) byline = byline.slice(0, -suffix.length).trim();
  }
  return byline;
}

export function extractByline(doc: HtmlDocument): string {
  const fromSelectors = cleanByline(bestExtracted(extractElement(doc, BYLINE_SELECTORS)));
  if (fromSelectors) return fromSelectors;

  for (const paragraph of doc.select("p")) {
    const text = doc.text(paragraph).trim();
    const lower = text.toLowerCase();
    if (lower.startsWith("by ") || lower.startsWith("written by ")) {
      const byline = cleanByline(text);
      if (byline) return byline;
    }
  }
  return "";
}

type DateCandidate = {
  value: string;
  score: number;
  fromMetadata: boolean;
};

function dateCandidates(extracted: ExtractedElements, fromMetadata: boolean): DateCandidate[] {
  return [...extracted].map(([value, { score }]) => ({ value, score, fromMetadata }));
}

/**
 * Publication date as a UTC ISO string, or "". Metadata ISO values win outright; otherwise the
 * best-scored date carrying a time of day, else the best-scored date at all.
 */
export function extractDate(doc: HtmlDocument): string {
  const candidates = [
    ...dateCandidates(extractElement(doc, METADATA_DATE_SELECTORS), true),
    ...dateCandidates(extractElement(doc, VISIBLE_DATE_SELECTORS), false),
  ].sort((a, b) => b.score - a.score);

  let firstDateOnly = "";
  for (const candidate of candidates) {
    if (candidate.fromMetadata) {
      const iso = parseIsoDate(candidate.value);
      if (iso) return iso;
    }
    const parsed = parseFlexibleDate(candidate.value);
    if (!parsed) continue;
    if (hasTimeOfDay(parsed)) return parsed;
    if (!firstDateOnly) firstDateOnly = parsed;
  }
  return firstDateOnly;
}

export function extractMetadata(doc: HtmlDocument): ArticleMetadata {
  return {
    title: extractTitle(doc),
    byline: extractByline(doc),
    date: extractDate(doc),
  };
}

/** Fills empty fields from Readability's reading of the same document. */
export function withReadableFallback(doc: HtmlDocument, metadata: ArticleMetadata): ArticleMetadata {
  if (metadata.title && metadata.byline && metadata.date) return metadata;
  const readable = extractReadableFields(doc);
  return {
    title: metadata.title || readable.title,
    byline: metadata.byline || cleanByline(readable.byline),
    date: metadata.date || parseFlexibleDate(readable.publishedTime),
  };
}
