import { elementChildren, tagName } from "../dom/html-document.js";
import { countSentences, countWords } from "../text/tokenize.js";
import {
  CONTENT_PATTERNS,
  NON_CONTENT_PATTERNS,
  TAG_BONUSES,
  matchesAnyPattern,
  tagBonus,
  type TagBonus,
} from "./patterns.js";

/** Weights of the content score. The defaults are empirically tuned. */
export type ScoringWeights = {
  textDensity: number;
  paragraphDensity: number;
  sentenceDensity: number;
  wordDensity: number;
  idContentBoost: number;
  classContentBoost: number;
  nonContentFactor: number;
  heading: number;
  list: number;
  image: number;
  paragraphChild: number;
  captionedFigure: number;
  tagBonuses: readonly TagBonus[];
  contentPatterns: readonly string[];
  nonContentPatterns: readonly string[];
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  textDensity: 50,
  paragraphDensity: 20,
  sentenceDensity: 15,
  wordDensity: 15,
  idContentBoost: 5,
  classContentBoost: 3,
  nonContentFactor: 0.5,
  heading: 10,
  list: 5,
  image: 3,
  paragraphChild: 5,
  captionedFigure: 10,
  tagBonuses: TAG_BONUSES,
  contentPatterns: CONTENT_PATTERNS,
  nonContentPatterns: NON_CONTENT_PATTERNS,
};

function textOf(element: Element): string {
  return element.textContent ?? "";
}

function countDescendants(element: Element, selector: string): number {
  return element.querySelectorAll(selector).length;
}

/** Per thousand characters of text; 0 for empty text. */
function perThousandChars(count: number, textLength: number): number {
  return textLength === 0 ? 0 : (count / textLength) * 1000;
}

export function linkTextLength(element: Element): number {
  return Array.from(element.querySelectorAll("a")).reduce(
    (acc, anchor) => acc + textOf(anchor).length,
    0
  );
}

export function textDensity(element: Element): number {
  const htmlLength = element.outerHTML.length;
  if (htmlLength === 0) return 0;
  return textOf(element).length / htmlLength;
}

/** Fraction of the element's text that sits inside anchors. */
export function linkDensity(element: Element): number {
  const textLength = textOf(element).length;
  if (textLength === 0) return 0;
  return linkTextLength(element) / textLength;
}

export function linkDensityScore(element: Element): number {
  const textLength = textOf(element).length;
  if (textLength === 0) return 0;
  return 1 - linkTextLength(element) / textLength;
}

export function headingDensity(element: Element): number {
  return perThousandChars(countDescendants(element, "h1, h2, h3, h4, h5, h6"), textOf(element).length);
}

export function listDensity(element: Element): number {
  return perThousandChars(countDescendants(element, "li"), textOf(element).length);
}

export function imageDensity(element: Element): number {
  const htmlLength = element.outerHTML.length;
  if (htmlLength === 0) return 0;
  return (countDescendants(element, "img") / htmlLength) * 1000;
}

export function contentBoost(element: Element, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): number {
  const id = element.getAttribute("id");
  const className = element.getAttribute("class");
  let boost = 1;
  if (id !== null && matchesAnyPattern(id, weights.contentPatterns)) boost += weights.idContentBoost;
  if (className !== null && matchesAnyPattern(className, weights.contentPatterns)) {
    boost += weights.classContentBoost;
  }
  const penalized =
    (id !== null && matchesAnyPattern(id, weights.nonContentPatterns)) ||
    (className !== null && matchesAnyPattern(className, weights.nonContentPatterns));
  return penalized ? boost * weights.nonContentFactor : boost;
}

export function analyzeContentDensity(
  element: Element,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const text = textOf(element);
  if (element.outerHTML.length === 0) return 0;
  const textLength = text.length;
  const paragraphs = perThousandChars(countDescendants(element, "p"), textLength);
  const sentences = perThousandChars(countSentences(text), textLength);
  const words = textLength === 0 ? 0 : (countWords(text) / textLength) * 100;

  const combined =
    textDensity(element) * weights.textDensity +
    paragraphs * weights.paragraphDensity +
    sentences * weights.sentenceDensity +
    words * weights.wordDensity;
  return combined * contentBoost(element, weights);
}

function captionedFigureCount(element: Element): number {
  return Array.from(element.querySelectorAll("figure")).filter(
    (figure) => figure.querySelector("figcaption") !== null && figure.querySelector("img") !== null
  ).length;
}

/** Content score of a subtree. Pure in the element's attributes, text and structure. */
export function scoreNode(element: Element, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): number {
  if (textOf(element).length === 0) return 0;

  // Direct children only; nested paragraphs already count through the densities.
  const paragraphChildren = elementChildren(element).filter((child) => tagName(child) === "p").length;
  return (
    analyzeContentDensity(element, weights) * linkDensityScore(element) +
    headingDensity(element) * weights.heading +
    listDensity(element) * weights.list +
    imageDensity(element) * weights.image +
    tagBonus(tagName(element), weights.tagBonuses) +
    paragraphChildren * weights.paragraphChild +
    captionedFigureCount(element) * weights.captionedFigure
  );
}
