import { readFileSync } from "node:fs";

const SYMBOL_FOLDING: ReadonlyArray<readonly [string, string]> = [
  ["\u2013", "-"],
  ["\u2014", "--"],
  ["\u2018", "'"],
  ["\u2019", "'"],
  ["\u201c", '"'],
  ["\u201d", '"'],
  ["\u2026", "..."],
  ["\u00a0", " "],
  ["\u00ad", ""],
  ["\u2022", "*"],
  ["\u2023", "*"],
  ["\u2043", "*"],
  ["\u2212", "-"],
  ["\u00b7", "*"],
  ["\u00b0", "degrees"],
  ["\u00ae", "(R)"],
  ["\u00a9", "(C)"],
  ["\u2122", "(TM)"],
  ["\u00a2", "c"],
  ["\u00a3", "GBP"],
  ["\u00a5", "JPY"],
  ["\u20ac", "EUR"],
  ["\u00f7", "/"],
  ["\u00d7", "x"],
];

const FOLDING_MAP = new Map<string, string>(SYMBOL_FOLDING);
const FOLDING_RE = new RegExp(`[${SYMBOL_FOLDING.map(([from]) => from).join("")}]`, "gu");

const LONE_SURROGATE_RE = /\p{Cs}/gu;
// Control, format, surrogate, private-use, unassigned, line and paragraph separators.
const CONTROL_RE = /(?![\n\t\r\f])[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}]/gu;
const WHITESPACE_RE = /\s+/g;
const INTER_TAG_WS_RE = />\s+</g;
const ENTITY_RE = /&(#[0-9]+|#[xX][0-9a-fA-F]+|[a-zA-Z][a-zA-Z0-9]*);/g;

function loadEntityTable(): ReadonlyMap<string, string> {
  const raw = readFileSync(new URL("../../data/html-entities.json", import.meta.url), "utf-8");
  const parsed: unknown = JSON.parse(raw);
  const table = new Map<string, string>();
  if (!parsed || typeof parsed !== "object") return table;
  for (const [entity, value] of Object.entries(parsed)) {
    if (typeof value === "string") table.set(entity, value);
  }
  return table;
}

const HTML_ENTITIES = loadEntityTable();

export function normalizeUnicode(text: string): string {
  if (!text) return "";
  const composed = text.normalize("NFKC");
  return composed.replace(FOLDING_RE, (ch) => FOLDING_MAP.get(ch) ?? ch);
}

export function stripControlChars(text: string): string {
  if (!text) return "";
  return text.replace(CONTROL_RE, "");
}

export function normalizeWhitespace(text: string): string {
  if (!text) return "";
  return text.replace(WHITESPACE_RE, " ").trim();
}

/**
 * Unicode fold, control-character strip and whitespace collapse, in that order.
 * Lone surrogates become U+FFFD before folding.
 */
export function normalizeText(text: string): string {
  if (!text) return "";
  const wellFormed = text.replace(LONE_SURROGATE_RE, "\ufffd");
  return normalizeWhitespace(stripControlChars(normalizeUnicode(wellFormed)));
}

function decodeNumericReference(body: string): string | null {
  const hex = body[1] === "x" || body[1] === "X";
  const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
  if (!Number.isFinite(codePoint) || codePoint <= 0 || codePoint > 0x10ffff) return null;
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return null;
  return String.fromCodePoint(codePoint);
}

export function decodeHtmlEntities(text: string): string {
  if (!text.includes("&")) return text;
  return text.replace(ENTITY_RE, (entity, body: string) => {
    if (body.startsWith("#")) return decodeNumericReference(body) ?? entity;
    return HTML_ENTITIES.get(entity) ?? entity;
  });
}

export function stripHtmlWhitespace(html: string): string {
  if (!html) return "";
  return html.replace(INTER_TAG_WS_RE, "><").trim();
}

// Quotes only need escaping inside attribute values; text runs between tags get literal quotes.
export function normalizeEntityQuoting(html: string): string {
  return html.replace(/>([^<]*)</g, (_match, run: string) => {
    const unquoted = run
      .replace(/&quot;|&#34;|&#x22;/g, '"')
      .replace(/&#39;|&#x27;|&apos;/g, "'");
    return `>${unquoted}<`;
  });
}
