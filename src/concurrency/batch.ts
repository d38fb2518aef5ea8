import type { HtmlDocument } from "../dom/html-document.js";

export type SelectionAction = (element: Element) => void;

/**
 * Applies every action whose selector matches, in one document-order pass over the elements
 * present when the pass starts. On a node matched by several selectors, actions run in the map's
 * iteration order. Nodes detached by an earlier action are skipped.
 */
export function batchProcessSelections(
  doc: HtmlDocument,
  operations: ReadonlyMap<string, SelectionAction>
): number {
  let applied = 0;
  for (const element of doc.select("*")) {
    for (const [selector, action] of operations) {
      if (!element.isConnected) break;
      if (element.matches(selector)) {
        action(element);
        applied += 1;
      }
    }
  }
  return applied;
}
