import { JSDOM } from "jsdom";
import { ParseError, StructureError, toError } from "../errors.js";

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;
export const DOCUMENT_TYPE_NODE = 10;

/** Element-child indexes from a root element down to a descendant. */
export type NodePath = number[];

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

function isDocument(node: Node): node is Document {
  return node.nodeType === DOCUMENT_NODE;
}

export function tagName(node: Node): string {
  return isElement(node) ? node.localName : "";
}

export function elementChildren(node: ParentNode): Element[] {
  return Array.from(node.children);
}

/** Depth-first, document-order list of every node below `root` (root excluded). */
export function descendantNodes(root: Node): Node[] {
  const out: Node[] = [];
  const visit = (node: Node): void => {
    for (const child of Array.from(node.childNodes)) {
      out.push(child);
      visit(child);
    }
  };
  visit(root);
  return out;
}

export function nodePath(root: Element, target: Element): NodePath | null {
  const path: NodePath = [];
  let current: Element = target;
  while (current !== root) {
    const parent = current.parentElement;
    if (!parent) return null;
    path.unshift(elementChildren(parent).indexOf(current));
    current = parent;
  }
  return path;
}

export function resolveNodePath(root: Element, path: NodePath): Element | null {
  let current: Element | undefined = root;
  for (const index of path) {
    current = current ? elementChildren(current)[index] : undefined;
    if (!current) return null;
  }
  return current ?? null;
}

export class HtmlDocument {
  private constructor(readonly document: Document) {}

  static parse(html: string): HtmlDocument {
    if (html.includes("\u0000")) {
      throw new ParseError("input contains NUL characters and cannot be tokenized as HTML");
    }
    let dom: JSDOM;
    try {
      dom = new JSDOM(html);
    } catch (error) {
      throw new ParseError(`failed to tokenize HTML: ${toError(error).message}`, { cause: error });
    }
    return new HtmlDocument(dom.window.document);
  }

  static fromDocument(document: Document): HtmlDocument {
    return new HtmlDocument(document);
  }

  get root(): Element {
    return this.document.documentElement;
  }

  hasBody(): boolean {
    return this.document.querySelector("body") !== null;
  }

  get body(): Element {
    const body = this.document.querySelector("body");
    if (!body) throw new StructureError("document has no body element");
    return body;
  }

  get head(): Element | null {
    return this.document.querySelector("head");
  }

  get title(): string {
    return this.document.querySelector("title")?.textContent ?? "";
  }

  select(selector: string, root: ParentNode = this.document): Element[] {
    return Array.from(root.querySelectorAll(selector));
  }

  selectOne(selector: string, root: ParentNode = this.document): Element | null {
    return root.querySelector(selector);
  }

  text(node: Node): string {
    return node.textContent ?? "";
  }

  outerHtml(element: Element): string {
    return element.outerHTML;
  }

  innerHtml(element: Element): string {
    return element.innerHTML;
  }

  getAttr(element: Element, name: string): string | null {
    return element.getAttribute(name);
  }

  setAttr(element: Element, name: string, value: string): void {
    element.setAttribute(name, value);
  }

  removeAttr(element: Element, name: string): void {
    element.removeAttribute(name);
  }

  createElement(tag: string): Element {
    return this.document.createElement(tag);
  }

  createText(data: string): Text {
    return this.document.createTextNode(data);
  }

  parseFragment(html: string): Node[] {
    const template = this.document.createElement("template");
    template.innerHTML = html;
    return Array.from(template.content.childNodes);
  }

  remove(node: ChildNode): void {
    node.remove();
  }

  replaceWith(node: ChildNode, fragment: string | Node[]): void {
    node.replaceWith(...this.toNodes(fragment));
  }

  /** Splices the element's children into its parent and drops the element. */
  unwrap(element: Element): void {
    element.replaceWith(...Array.from(element.childNodes));
  }

  insertBefore(node: ChildNode, fragment: string | Node[]): void {
    node.before(...this.toNodes(fragment));
  }

  insertAfter(node: ChildNode, fragment: string | Node[]): void {
    node.after(...this.toNodes(fragment));
  }

  serialize(): string {
    const doctype = this.document.doctype;
    const prefix = doctype ? `<!DOCTYPE ${doctype.name}>` : "";
    return `${prefix}${this.root.outerHTML}`;
  }

  clone(): HtmlDocument {
    const copy = this.document.cloneNode(true);
    if (!isDocument(copy)) throw new StructureError("document clone did not produce a document");
    return new HtmlDocument(copy);
  }

  private toNodes(fragment: string | Node[]): Node[] {
    return typeof fragment === "string" ? this.parseFragment(fragment) : fragment;
  }
}
