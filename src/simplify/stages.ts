import {
  COMMENT_NODE,
  DOCUMENT_TYPE_NODE,
  descendantNodes,
  isText,
  tagName,
  type HtmlDocument,
} from "../dom/html-document.js";
import { linkDensity } from "../scoring/density.js";
import { normalizeText } from "../text/normalize.js";
import {
  ELEMENTS_TO_DELETE,
  ELEMENTS_TO_UNWRAP,
  KNOWN_ELEMENTS,
  LINEBREAK_ELEMENTS,
  STRUCTURAL_ELEMENTS,
} from "./vocabulary.js";

const STRUCTURAL = new Set<string>(STRUCTURAL_ELEMENTS);
const LINEBREAKS = new Set<string>(LINEBREAK_ELEMENTS);

export const DEFAULT_LINK_DENSITY_THRESHOLD = 0.5;

export function removeCommentsAndDoctype(doc: HtmlDocument): void {
  for (const node of descendantNodes(doc.document)) {
    if (node.nodeType === COMMENT_NODE || node.nodeType === DOCUMENT_TYPE_NODE) {
      node.parentNode?.removeChild(node);
    }
  }
}

export function stripAttributes(doc: HtmlDocument, allowlist: ReadonlySet<string>): void {
  for (const element of doc.select("*")) {
    const names = Array.from(element.attributes).map((attr) => attr.name);
    for (const name of names) {
      if (!allowlist.has(name)) element.removeAttribute(name);
    }
  }
}

export function removeBlacklisted(
  doc: HtmlDocument,
  linkDensityThreshold = DEFAULT_LINK_DENSITY_THRESHOLD
): void {
  for (const element of doc.select(ELEMENTS_TO_DELETE.join(", "))) {
    element.remove();
  }
  for (const element of doc.select("*")) {
    if (!element.isConnected || STRUCTURAL.has(tagName(element))) continue;
    if (linkDensity(element) > linkDensityThreshold) element.remove();
  }
}

export function unwrapFormatting(doc: HtmlDocument): void {
  for (const element of doc.select(ELEMENTS_TO_UNWRAP.join(", "))) {
    doc.unwrap(element);
  }
}

const SPECIAL_MARKERS: ReadonlyArray<readonly [tag: string, prefix: string, suffix: string]> = [
  ["q", '"', '"'],
  ["sub", "_", ""],
  ["sup", "^", ""],
];

/** `<q>` gains literal quotes, `<sub>` a `_` prefix, `<sup>` a `^` prefix; then the tag goes. */
export function processSpecialElements(doc: HtmlDocument): void {
  for (const [tag, prefix, suffix] of SPECIAL_MARKERS) {
    for (const element of doc.select(tag)) {
      if (doc.text(element).length > 0) {
        if (prefix) element.prepend(prefix);
        if (suffix) element.append(suffix);
      }
      doc.unwrap(element);
    }
  }
}

export function unwrapUnknownElements(doc: HtmlDocument): void {
  for (const element of doc.select("*")) {
    if (!KNOWN_ELEMENTS.has(tagName(element))) doc.unwrap(element);
  }
}

export function consolidateText(doc: HtmlDocument): void {
  doc.document.normalize();
}

function isRemovableWhenEmpty(element: Element): boolean {
  const tag = tagName(element);
  return !STRUCTURAL.has(tag) && !LINEBREAKS.has(tag);
}

/**
 * Drops blank text nodes, then elements whose normalized text is empty (line breaks inside
 * them go too), until nothing changes.
 */
export function removeEmptyNodes(doc: HtmlDocument): void {
  for (const node of descendantNodes(doc.document)) {
    if (isText(node) && normalizeText(node.data) === "") node.remove();
  }

  let removed = true;
  while (removed) {
    removed = false;
    for (const element of doc.select("*")) {
      if (!element.isConnected || !isRemovableWhenEmpty(element)) continue;
      if (normalizeText(doc.text(element)) === "") {
        element.remove();
        removed = true;
      }
    }
  }
}

export function normalizeTextNodes(doc: HtmlDocument): void {
  for (const node of descendantNodes(doc.document)) {
    if (!isText(node)) continue;
    const normalized = normalizeText(node.data);
    if (normalized) {
      node.data = normalized;
    } else {
      node.remove();
    }
  }
}
