import { HtmlDocument } from "../dom/html-document.js";
import { normalizeWhitespace } from "../text/normalize.js";

export type SelectorScore = {
  selector: string;
  score: number;
  /** Read this attribute instead of the element's text. */
  attribute?: string;
};

export type ExtractedElement = {
  score: number;
  selectors: string[];
};

export type ExtractedElements = Map<string, ExtractedElement>;

export type PostProcess = (extracted: ExtractedElements) => ExtractedElements;

function describe(entry: SelectorScore): string {
  return entry.attribute ? `${entry.selector}@${entry.attribute}` : entry.selector;
}

function valueOf(element: Element, attribute?: string): string {
  const raw = attribute ? element.getAttribute(attribute) ?? "" : element.textContent ?? "";
  return normalizeWhitespace(raw);
}

/**
 * Collects the normalized text (or attribute value) of every match of every selector. A value
 * found several times accumulates the scores of all selectors that found it.
 */
export function extractElement(
  input: string | HtmlDocument,
  selectors: readonly SelectorScore[],
  postProcess?: PostProcess
): ExtractedElements {
  const doc = typeof input === "string" ? HtmlDocument.parse(input) : input;
  const extracted: ExtractedElements = new Map();

  for (const entry of selectors) {
    for (const element of doc.select(entry.selector)) {
      const value = valueOf(element, entry.attribute);
      if (!value) continue;
      const existing = extracted.get(value);
      if (existing) {
        existing.score += entry.score;
        existing.selectors = [...existing.selectors, describe(entry)].sort();
      } else {
        extracted.set(value, { score: entry.score, selectors: [describe(entry)] });
      }
    }
  }

  return postProcess ? postProcess(extracted) : extracted;
}

/** Highest-scoring value; the first one seen wins ties. Empty string for no candidates. */
export function bestExtracted(extracted: ExtractedElements): string {
  let best = "";
  let bestScore = Number.NEGATIVE_INFINITY;
  for (const [value, { score }] of extracted) {
    if (score > bestScore) {
      best = value;
      bestScore = score;
    }
  }
  return best;
}
