import type { HtmlDocument } from "../dom/html-document.js";
import { DEFAULT_SCORING_WEIGHTS, scoreNode, type ScoringWeights } from "../scoring/density.js";

export const FOCUS_ATTRIBUTE = "data-content-focus";

const CANDIDATE_SELECTORS = [
  "[id*='content']",
  "[id*='article']",
  "[id*='main']",
  "[id*='body']",
  "[id*='entry']",
  "[class*='content']",
  "[class*='article']",
  "[class*='main']",
  "[class*='body']",
  "[class*='entry']",
  "article",
  "main",
  ".post",
  ".hentry",
  `[${FOCUS_ATTRIBUTE}='true']`,
];

const SCAN_SELECTOR = "div, section";
export const DEFAULT_MIN_SCAN_TEXT_LENGTH = 100;

export type LocateTier = "candidate" | "scan" | "body";

export type LocatedContent = {
  node: Element;
  tier: LocateTier;
  score: number;
};

export type LocateOptions = {
  minScanTextLength?: number;
  weights?: ScoringWeights;
  scorer?: (element: Element) => number;
};

/** Candidate nodes in document order, each at most once. */
export function contentCandidates(doc: HtmlDocument): Element[] {
  return doc.select(CANDIDATE_SELECTORS.join(", "));
}

function pickBest(
  nodes: Element[],
  scorer: (element: Element) => number,
  floor: number
): { node: Element; score: number } | null {
  let best: { node: Element; score: number } | null = null;
  for (const node of nodes) {
    const score = scorer(node);
    if (score > (best ? best.score : floor)) {
      best = { node, score };
    }
  }
  return best;
}

export function locateMainContent(doc: HtmlDocument, options: LocateOptions = {}): LocatedContent {
  const weights = options.weights ?? DEFAULT_SCORING_WEIGHTS;
  const scorer = options.scorer ?? ((element: Element) => scoreNode(element, weights));
  const minScanTextLength = options.minScanTextLength ?? DEFAULT_MIN_SCAN_TEXT_LENGTH;

  const candidate = pickBest(contentCandidates(doc), scorer, 0);
  if (candidate) return { ...candidate, tier: "candidate" };

  const scanned = doc
    .select(SCAN_SELECTOR)
    .filter((node) => (node.textContent ?? "").length >= minScanTextLength);
  const scan = pickBest(scanned, scorer, Number.NEGATIVE_INFINITY);
  if (scan) return { ...scan, tier: "scan" };

  return { node: doc.body, tier: "body", score: 0 };
}
