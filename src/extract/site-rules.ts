import { readFileSync } from "node:fs";
import { z } from "zod";
import { batchProcessSelections, type SelectionAction } from "../concurrency/batch.js";
import type { HtmlDocument } from "../dom/html-document.js";
import { FOCUS_ATTRIBUTE } from "../locate/main-content.js";

const siteRuleSchema = z.object({
  name: z.string(),
  hosts: z.array(z.string()),
  remove: z.array(z.string().min(1)),
  focus: z.array(z.string().min(1)),
});

const siteRuleTableSchema = z.object({
  sites: z.array(siteRuleSchema),
  generic: siteRuleSchema,
});

export type SiteRule = z.infer<typeof siteRuleSchema>;
export type SiteRuleTable = z.infer<typeof siteRuleTableSchema>;

let cachedTable: SiteRuleTable | null = null;

export function loadSiteRules(): SiteRuleTable {
  if (!cachedTable) {
    const raw = readFileSync(new URL("../../data/site-rules.json", import.meta.url), "utf-8");
    cachedTable = siteRuleTableSchema.parse(JSON.parse(raw));
  }
  return cachedTable;
}

/** The rule for `hostname`, matched by domain suffix; the generic rule otherwise. */
export function ruleForHost(hostname: string, table: SiteRuleTable = loadSiteRules()): SiteRule {
  const host = hostname.toLowerCase();
  const site = table.sites.find((rule) =>
    rule.hosts.some((domain) => host === domain || host.endsWith(`.${domain}`))
  );
  return site ?? table.generic;
}

const KEEP = new Set(["html", "head", "body"]);

function removeElement(element: Element): void {
  if (!KEEP.has(element.localName)) element.remove();
}

function markFocus(element: Element): void {
  element.setAttribute(FOCUS_ATTRIBUTE, "true");
}

/** Removes the host's boilerplate and marks its content roots, in place. Returns `doc`. */
export function applySiteRules(
  doc: HtmlDocument,
  hostname: string,
  table: SiteRuleTable = loadSiteRules()
): HtmlDocument {
  const rule = ruleForHost(hostname, table);
  const operations = new Map<string, SelectionAction>();
  if (rule.remove.length > 0) operations.set(rule.remove.join(", "), removeElement);
  if (rule.focus.length > 0) operations.set(rule.focus.join(", "), markFocus);
  batchProcessSelections(doc, operations);
  return doc;
}
