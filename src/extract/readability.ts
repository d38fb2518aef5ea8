import { Readability } from "@mozilla/readability";
import type { HtmlDocument } from "../dom/html-document.js";

export type ReadableFields = {
  title: string;
  byline: string;
  publishedTime: string;
  text: string;
};

function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Readability's view of `doc`. Runs on a copy because Readability rewrites the tree it reads. */
export function extractReadableFields(doc: HtmlDocument): ReadableFields {
  const reader = new Readability(doc.clone().document);
  const article = reader.parse();
  return {
    title: normalize(article?.title ?? ""),
    byline: normalize(article?.byline ?? ""),
    publishedTime: normalize(article?.publishedTime ?? ""),
    text: normalize(article?.textContent ?? ""),
  };
}
