import { elementChildren, isElement, isText, tagName, type HtmlDocument } from "../dom/html-document.js";
import { normalizeText } from "../text/normalize.js";
import { BARE_TEXT_CONTAINERS, BLOCK_LEVEL_WHITELIST, ILLEGAL_IN_PARAGRAPH } from "./vocabulary.js";

const CONTAINERS = new Set<string>(BARE_TEXT_CONTAINERS);
const BLOCKS = new Set<string>(BLOCK_LEVEL_WHITELIST);
const ILLEGAL = new Set<string>(ILLEGAL_IN_PARAGRAPH);

type SplitPieces = { before: Node[]; after: Node[] };

/**
 * Detaches everything in `container` before and after `target`. Inline ancestors between the
 * two are cloned shallowly so each piece keeps its wrapping. `target` itself stays in place.
 */
export function splitAround(container: Element, target: Node): SplitPieces {
  let before: Node | null = null;
  let after: Node | null = null;
  let current: Node = target;
  let parent: ParentNode | null = current.parentNode;

  while (parent && parent !== container) {
    const beforeShell = parent.cloneNode(false);
    while (parent.firstChild && parent.firstChild !== current) {
      beforeShell.appendChild(parent.firstChild);
    }
    if (before) beforeShell.appendChild(before);

    const afterShell = parent.cloneNode(false);
    if (after) afterShell.appendChild(after);
    while (current.nextSibling) afterShell.appendChild(current.nextSibling);

    before = beforeShell;
    after = afterShell;
    current = parent;
    parent = current.parentNode;
  }

  const beforeNodes: Node[] = [];
  while (container.firstChild && container.firstChild !== current) {
    beforeNodes.push(container.removeChild(container.firstChild));
  }
  if (before) beforeNodes.push(before);

  const afterNodes: Node[] = after ? [after] : [];
  while (current.nextSibling) afterNodes.push(container.removeChild(current.nextSibling));

  return { before: beforeNodes, after: afterNodes };
}

function isBlankRun(nodes: Node[]): boolean {
  return normalizeText(nodes.map((node) => node.textContent ?? "").join("")) === "";
}

function paragraphWith(template: Element, nodes: Node[]): Node {
  const paragraph = template.cloneNode(false);
  for (const node of nodes) paragraph.appendChild(node);
  return paragraph;
}

function nearestParagraph(node: Node): Element | null {
  return node.parentElement?.closest("p") ?? null;
}

/** The outermost block between `nested` and `paragraph`, so a `<li>` leaves with its list. */
function outermostBlock(nested: Element, paragraph: Element): Element {
  let block = nested;
  for (let node = nested.parentElement; node && node !== paragraph; node = node.parentElement) {
    if (ILLEGAL.has(tagName(node))) block = node;
  }
  return block;
}

/** Moves block-level descendants out of their paragraph, splitting it around them. */
export function unnestParagraphs(doc: HtmlDocument): void {
  for (const illegal of ILLEGAL_IN_PARAGRAPH) {
    for (;;) {
      const found = doc.selectOne(`p ${illegal}`);
      const paragraph = found ? nearestParagraph(found) : null;
      if (!found || !paragraph) break;
      const nested = outermostBlock(found, paragraph);

      const { before, after } = splitAround(paragraph, nested);
      const pieces: Node[] = [];
      if (!isBlankRun(before)) pieces.push(paragraphWith(paragraph, before));
      pieces.push(nested);
      if (!isBlankRun(after)) pieces.push(paragraphWith(paragraph, after));
      paragraph.replaceWith(...pieces);
    }
  }
}

function mergeIntoNeighbours(text: Text): void {
  let merged = text;
  const previous = merged.previousSibling;
  if (previous && isText(previous)) {
    previous.data += merged.data;
    merged.remove();
    merged = previous;
  }
  const next = merged.nextSibling;
  if (next && isText(next)) {
    merged.data += next.data;
    next.remove();
  }
}

function replaceWithSpace(doc: HtmlDocument, marker: Element): void {
  const space = doc.createText(" ");
  marker.replaceWith(space);
  mergeIntoNeighbours(space);
}

function isBlankText(node: Node): boolean {
  return isText(node) && normalizeText(node.data) === "";
}

/** The `<br>` and every `<br>` sibling that follows it with only whitespace in between. */
function breakRun(first: Element): { breaks: Element[]; gaps: Node[] } {
  const breaks: Element[] = [first];
  const gaps: Node[] = [];
  let pending: Node[] = [];
  let node = first.nextSibling;
  while (node) {
    if (isBlankText(node)) {
      pending.push(node);
    } else if (isElement(node) && tagName(node) === "br") {
      gaps.push(...pending);
      pending = [];
      breaks.push(node);
    } else {
      break;
    }
    node = node.nextSibling;
  }
  return { breaks, gaps };
}

function splitAtMarker(doc: HtmlDocument, marker: Element): void {
  const paragraph = nearestParagraph(marker);
  if (paragraph) {
    const { before, after } = splitAround(paragraph, marker);
    const pieces = [before, after]
      .filter((run) => !isBlankRun(run))
      .map((run) => paragraphWith(paragraph, run));
    paragraph.replaceWith(...(pieces.length > 0 ? pieces : [paragraphWith(paragraph, [])]));
    return;
  }
  const parent = marker.parentElement;
  if (parent && CONTAINERS.has(tagName(parent))) {
    marker.remove();
    return;
  }
  replaceWithSpace(doc, marker);
}

/**
 * A lone `<br>` becomes a space. Two or more consecutive `<br>`, or an `<hr>`, end the
 * paragraph: it is split at that point and the marker is dropped.
 */
export function insertParagraphBreaks(doc: HtmlDocument): void {
  for (;;) {
    const br = doc.selectOne("br");
    if (!br) break;
    const { breaks, gaps } = breakRun(br);
    if (breaks.length === 1) {
      replaceWithSpace(doc, br);
      continue;
    }
    for (const node of [...breaks.slice(1), ...gaps]) node.parentNode?.removeChild(node);
    splitAtMarker(doc, br);
  }
  for (;;) {
    const hr = doc.selectOne("hr");
    if (!hr) break;
    splitAtMarker(doc, hr);
  }
}

function isSoleParagraph(paragraph: Element): boolean {
  const parent = paragraph.parentElement;
  if (!parent) return false;
  const tag = tagName(parent);
  if (!BLOCKS.has(tag) || CONTAINERS.has(tag) || tag === "p") return false;
  if (elementChildren(parent).length !== 1) return false;
  return Array.from(parent.childNodes).every((node) => node === paragraph || isBlankText(node));
}

/**
 * Wraps each non-blank text child of a block container in its own `<p>`, then drops a
 * `<p>` that is the only content of a non-container block such as `<li>` or `<td>`.
 */
export function wrapBareText(doc: HtmlDocument): void {
  for (const container of doc.select(BARE_TEXT_CONTAINERS.join(", "))) {
    for (const child of Array.from(container.childNodes)) {
      if (!isText(child) || normalizeText(child.data) === "") continue;
      const paragraph = doc.createElement("p");
      child.replaceWith(paragraph);
      paragraph.appendChild(child);
    }
  }
  for (const paragraph of doc.select("p")) {
    if (isSoleParagraph(paragraph)) doc.unwrap(paragraph);
  }
}
