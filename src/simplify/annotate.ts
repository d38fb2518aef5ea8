import { createHash } from "node:crypto";
import { HtmlDocument, elementChildren, tagName } from "../dom/html-document.js";
import { normalizeText } from "../text/normalize.js";

export const DIGEST_ATTRIBUTE = "data-content-digest";
export const INDEX_ATTRIBUTE = "data-node-index";

const LEAF_TAGS = new Set(["p", "li"]);

function sha256(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

function combineDigests(digests: string[]): string {
  const present = digests.filter((digest) => digest.length > 0);
  return present.length > 0 ? sha256(present.join("")) : "";
}

function leafDigest(element: Element): string {
  const text = normalizeText(element.textContent ?? "");
  return text ? sha256(text) : "";
}

function digestOf(element: Element, stamp: boolean): string {
  const digest = LEAF_TAGS.has(tagName(element))
    ? leafDigest(element)
    : combineDigests(elementChildren(element).map((child) => digestOf(child, stamp)));
  if (stamp && digest) element.setAttribute(DIGEST_ATTRIBUTE, digest);
  return digest;
}

/**
 * Hex SHA-256 of the content below `input`. Paragraphs and list items hash their normalized
 * text; any other element hashes the concatenated digests of its children. Empty string when
 * nothing below carries text.
 */
export function calculateContentDigest(input: string | Element): string {
  if (typeof input !== "string") return digestOf(input, false);
  const body = HtmlDocument.parse(input).body;
  const children = elementChildren(body);
  const [only] = children;
  return digestOf(children.length === 1 && only ? only : body, false);
}

/** Stamps every element that has a digest, the body included. */
export function addContentDigests(body: Element): string {
  return digestOf(body, true);
}

/** `0` on the root, `P.(i+1)` on the i-th element child of the node indexed `P`. */
export function addNodeIndexes(root: Element, index = "0"): void {
  root.setAttribute(INDEX_ATTRIBUTE, index);
  elementChildren(root).forEach((child, position) => {
    addNodeIndexes(child, `${index}.${position + 1}`);
  });
}
