import { HtmlDocument, tagName } from "../dom/html-document.js";
import { INDEX_ATTRIBUTE } from "../simplify/annotate.js";
import { normalizeText } from "../text/normalize.js";

export type TextBlock = {
  text: string;
  nodeIndex?: string;
};

export type PlainTextOptions = {
  /** Each list becomes one block of `* item` entries joined by ", ". */
  listsAsText?: boolean;
};

const TEXT_BLOCK_SELECTOR =
  "p, li, h1, h2, h3, h4, h5, h6, pre, blockquote, td, th, dt, dd, figcaption, caption";

function blockOf(element: Element, text: string): TextBlock {
  const nodeIndex = element.getAttribute(INDEX_ATTRIBUTE);
  return nodeIndex === null ? { text } : { text, nodeIndex };
}

function listText(list: Element): string {
  return Array.from(list.querySelectorAll("li"))
    .map((item) => normalizeText(item.textContent ?? ""))
    .filter((text) => text.length > 0)
    .map((text) => `* ${text}`)
    .join(", ");
}

/** Text of the innermost block elements, in document order. */
export function extractPlainText(input: string | HtmlDocument, options: PlainTextOptions = {}): TextBlock[] {
  const doc = typeof input === "string" ? HtmlDocument.parse(input) : input;
  const blocks: TextBlock[] = [];

  for (const element of doc.select(`${TEXT_BLOCK_SELECTOR}, ul, ol`)) {
    const tag = tagName(element);
    if (tag === "ul" || tag === "ol") {
      if (!options.listsAsText || element.parentElement?.closest("ul, ol")) continue;
      const text = listText(element);
      if (text) blocks.push(blockOf(element, text));
      continue;
    }
    if (options.listsAsText && element.closest("ul, ol")) continue;
    if (element.querySelector(TEXT_BLOCK_SELECTOR)) continue;
    const text = normalizeText(element.textContent ?? "");
    if (text) blocks.push(blockOf(element, text));
  }
  return blocks;
}

export function plainTextOf(blocks: readonly TextBlock[]): string {
  return blocks.map((block) => block.text).join("\n\n");
}
