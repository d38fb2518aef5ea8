import { describe, expect, test } from "vitest";
import { HtmlDocument, isElement } from "../src/dom/html-document.js";
import {
  insertParagraphBreaks,
  splitAround,
  unnestParagraphs,
  wrapBareText,
} from "../src/simplify/paragraphs.js";

function element(doc: HtmlDocument, selector: string): Element {
  const found = doc.selectOne(selector);
  if (!found) throw new Error(`no ${selector} in fixture`);
  return found;
}

// The parser never nests blocks inside <p>, so these fixtures are assembled through the DOM.
function paragraphWithNestedDiv(): HtmlDocument {
  const doc = HtmlDocument.parse("<p>Before <span>x</span> After</p>");
  const span = element(doc, "span");
  const div = doc.createElement("div");
  div.textContent = "Inside";
  span.append(div, "y");
  return doc;
}

describe("splitAround", () => {
  test("detaches the content on either side and clones inline wrappers", () => {
    const doc = paragraphWithNestedDiv();
    const paragraph = element(doc, "p");
    const { before, after } = splitAround(paragraph, element(doc, "div"));
    const html = (nodes: Node[]) =>
      nodes.map((node) => (isElement(node) ? node.outerHTML : node.textContent)).join("");
    expect(html(before)).toBe("Before <span>x</span>");
    expect(html(after)).toBe("<span>y</span> After");
  });
});

describe("unnestParagraphs", () => {
  test("promotes the block and keeps inline wrappers on both halves", () => {
    const doc = paragraphWithNestedDiv();
    unnestParagraphs(doc);
    expect(doc.innerHtml(doc.body)).toBe(
      "<p>Before <span>x</span></p><div>Inside</div><p><span>y</span> After</p>"
    );
  });

  test("moves a whole list out rather than a single item", () => {
    const doc = HtmlDocument.parse("<p>Intro</p>");
    const paragraph = element(doc, "p");
    const list = doc.createElement("ul");
    list.innerHTML = "<li>a</li><li>b</li>";
    paragraph.append(list);
    unnestParagraphs(doc);
    expect(doc.innerHtml(doc.body)).toBe("<p>Intro</p><ul><li>a</li><li>b</li></ul>");
  });

  test("drops a blank half", () => {
    const doc = HtmlDocument.parse("<p> </p>");
    const heading = doc.createElement("h2");
    heading.textContent = "Title";
    element(doc, "p").append(heading, "Tail");
    unnestParagraphs(doc);
    expect(doc.innerHtml(doc.body)).toBe("<h2>Title</h2><p>Tail</p>");
  });
});

describe("insertParagraphBreaks", () => {
  test("treats breaks separated by whitespace as one run", () => {
    const doc = HtmlDocument.parse("<p>One<br> <br>Two</p>");
    insertParagraphBreaks(doc);
    expect(doc.innerHtml(doc.body)).toBe("<p>One</p><p>Two</p>");
  });

  test("keeps one paragraph when both halves are blank", () => {
    const doc = HtmlDocument.parse("<p><br><br></p>");
    insertParagraphBreaks(doc);
    expect(doc.innerHtml(doc.body)).toBe("<p></p>");
  });
});

describe("wrapBareText", () => {
  test("wraps each text run of a container separately", () => {
    const doc = HtmlDocument.parse("<div>One<h2>Mid</h2>Two</div>");
    wrapBareText(doc);
    expect(doc.innerHtml(doc.body)).toBe("<div><p>One</p><h2>Mid</h2><p>Two</p></div>");
  });

  test("leaves a paragraph that shares its list item with text", () => {
    const doc = HtmlDocument.parse("<ul><li>Lead <p>Item</p></li></ul>");
    wrapBareText(doc);
    expect(doc.innerHtml(doc.body)).toBe("<ul><li>Lead <p>Item</p></li></ul>");
  });
});
