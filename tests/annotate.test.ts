import { describe, expect, test } from "vitest";
import { HtmlDocument } from "../src/dom/html-document.js";
import {
  DIGEST_ATTRIBUTE,
  INDEX_ATTRIBUTE,
  addContentDigests,
  addNodeIndexes,
  calculateContentDigest,
} from "../src/simplify/annotate.js";

const HELLO = "185f8db32271fe25f561a6fc938b2e264306ec304eda518007d1764826381969";
const DIGEST_A = "ca978112ca1bbdcafac231b39a23dc4da786eff8147c4e72b9807785afee48bb";
const DIGEST_B = "3e23e8160039594a33894f6564e1b1348bbd7a0088d42c4acb73eeaed59c009d";
const DIGEST_AB = "62af5c3cb8da3e4f25061e829ebeea5c7513c54949115b1acc225930a90154da";
// Body digest over the single digest-bearing child div.
const DIGEST_AB_BODY = "67d7618c2df94a6c75999b9cb6bdb2fdd0a3a2ba507b9d638b10a9329628d99b";

describe("calculateContentDigest", () => {
  test("hashes the normalized text of a paragraph", () => {
    expect(calculateContentDigest("<p>Hello</p>")).toBe(HELLO);
    expect(calculateContentDigest("<p>  Hello\n</p>")).toBe(HELLO);
  });

  test("hashes the concatenated digests of children for interior nodes", () => {
    expect(calculateContentDigest("<ul><li>a</li><li>b</li></ul>")).toBe(DIGEST_AB);
  });

  test("skips children without content", () => {
    expect(calculateContentDigest("<div><p>a</p><div></div><p>b</p></div>")).toBe(DIGEST_AB);
  });

  test("is empty when nothing carries text", () => {
    expect(calculateContentDigest("<div><p> </p></div>")).toBe("");
  });
});

describe("addContentDigests", () => {
  test("stamps leaves and the interior nodes above them", () => {
    const doc = HtmlDocument.parse("<div><p>a</p><p>b</p></div><section></section>");
    const digest = addContentDigests(doc.body);
    expect(digest).toBe(DIGEST_AB_BODY);
    expect(doc.body.getAttribute(DIGEST_ATTRIBUTE)).toBe(DIGEST_AB_BODY);
    const [pa, pb] = doc.select("p");
    expect(pa?.getAttribute(DIGEST_ATTRIBUTE)).toBe(DIGEST_A);
    expect(pb?.getAttribute(DIGEST_ATTRIBUTE)).toBe(DIGEST_B);
    expect(doc.selectOne("div")?.getAttribute(DIGEST_ATTRIBUTE)).toBe(DIGEST_AB);
    expect(doc.selectOne("section")?.hasAttribute(DIGEST_ATTRIBUTE)).toBe(false);
  });
});

describe("addNodeIndexes", () => {
  test("labels nodes with dotted one-based child paths", () => {
    const doc = HtmlDocument.parse("<div><p>a</p><p>b</p></div><p>c</p>");
    addNodeIndexes(doc.body);
    const labels = doc.select("[data-node-index]").map((el) => el.getAttribute(INDEX_ATTRIBUTE));
    expect(labels).toEqual(["0", "0.1", "0.1.1", "0.1.2", "0.2"]);
  });
});
