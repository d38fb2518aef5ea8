import { z } from "zod";
import { HtmlDocument } from "../dom/html-document.js";
import { normalizeEntityQuoting, stripHtmlWhitespace } from "../text/normalize.js";
import { addContentDigests, addNodeIndexes } from "./annotate.js";
import { insertParagraphBreaks, unnestParagraphs, wrapBareText } from "./paragraphs.js";
import {
  DEFAULT_LINK_DENSITY_THRESHOLD,
  consolidateText,
  normalizeTextNodes,
  processSpecialElements,
  removeBlacklisted,
  removeCommentsAndDoctype,
  removeEmptyNodes,
  stripAttributes,
  unwrapFormatting,
  unwrapUnknownElements,
} from "./stages.js";
import { DEFAULT_ATTRIBUTE_ALLOWLIST } from "./vocabulary.js";

export const pipelineOptionsSchema = z
  .object({
    addContentDigests: z.boolean(),
    addNodeIndexes: z.boolean(),
    removeBlacklist: z.boolean(),
    unwrapElements: z.boolean(),
    processSpecial: z.boolean(),
    consolidateText: z.boolean(),
    removeEmpty: z.boolean(),
    unnestParagraphs: z.boolean(),
    insertBreaks: z.boolean(),
    wrapBareText: z.boolean(),
    attributeAllowlist: z.array(z.string().min(1)),
    linkDensityThreshold: z.number().min(0).max(1),
  })
  .strict();

export type PipelineOptions = z.infer<typeof pipelineOptionsSchema>;

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  addContentDigests: false,
  addNodeIndexes: false,
  removeBlacklist: true,
  unwrapElements: true,
  processSpecial: true,
  consolidateText: true,
  removeEmpty: true,
  unnestParagraphs: true,
  insertBreaks: true,
  wrapBareText: true,
  attributeAllowlist: [...DEFAULT_ATTRIBUTE_ALLOWLIST],
  linkDensityThreshold: DEFAULT_LINK_DENSITY_THRESHOLD,
};

/** Fills in defaults and rejects unknown keys or out-of-range values. */
export function resolvePipelineOptions(options: Partial<PipelineOptions> = {}): PipelineOptions {
  return pipelineOptionsSchema.parse({ ...DEFAULT_PIPELINE_OPTIONS, ...options });
}

function attributeAllowlist(options: PipelineOptions): Set<string> {
  const allowed = new Set(options.attributeAllowlist);
  if (!options.unwrapElements) allowed.add("href");
  return allowed;
}

/**
 * Rewrites `doc` in place. The stage order matters: each stage relies on what the previous
 * ones left behind. Disabled stages are skipped without compensating for them.
 */
export function simplifyDocument(doc: HtmlDocument, options: PipelineOptions = DEFAULT_PIPELINE_OPTIONS): void {
  const body = doc.body;

  removeCommentsAndDoctype(doc);
  stripAttributes(doc, attributeAllowlist(options));
  if (options.removeBlacklist) removeBlacklisted(doc, options.linkDensityThreshold);
  if (options.unwrapElements) unwrapFormatting(doc);
  if (options.processSpecial) processSpecialElements(doc);
  unwrapUnknownElements(doc);
  if (options.consolidateText) consolidateText(doc);
  if (options.removeEmpty) removeEmptyNodes(doc);
  if (options.unnestParagraphs) unnestParagraphs(doc);
  if (options.insertBreaks) insertParagraphBreaks(doc);
  if (options.wrapBareText) wrapBareText(doc);
  normalizeTextNodes(doc);
  if (options.addContentDigests) addContentDigests(body);
  if (options.addNodeIndexes) addNodeIndexes(body);
}

export function renderSimplified(doc: HtmlDocument): string {
  return normalizeEntityQuoting(stripHtmlWhitespace(doc.root.outerHTML));
}

/** Parses, simplifies and serializes. Throws `ParseError` or `StructureError`. */
export function simplifyHtml(html: string, options: Partial<PipelineOptions> = {}): string {
  const resolved = resolvePipelineOptions(options);
  const doc = HtmlDocument.parse(html);
  simplifyDocument(doc, resolved);
  return renderSimplified(doc);
}
