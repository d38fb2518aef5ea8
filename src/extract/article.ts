import { ExtractionCaches } from "../cache/extraction-caches.js";
import { parallelProcessNodes } from "../concurrency/parallel.js";
import {
  resolveExtractionOptions,
  type ExtractionOptions,
} from "../config/extraction.js";
import { HtmlDocument } from "../dom/html-document.js";
import { TimeoutError, toError } from "../errors.js";
import type { LocateTier } from "../locate/main-content.js";
import { logger } from "../observability/logger.js";
import { buildExtractionContext, type ExtractionContext } from "../observability/request-context.js";
import {
  parseWithRepair,
  withFallback,
  withRetry,
  withTimeout,
  wrapInDocumentShell,
} from "../resilience/guards.js";
import { renderSimplified, resolvePipelineOptions, simplifyDocument } from "../simplify/pipeline.js";
import { extractMetadata, withReadableFallback, type ArticleMetadata } from "./metadata.js";
import { extractPlainText, type TextBlock } from "./plain-text.js";
import { applySiteRules } from "./site-rules.js";

export type Article = ArticleMetadata & {
  content: string;
  plainText: TextBlock[];
  mainContentTier: LocateTier;
  /** Metadata extraction failed and the fields hold fallback values. */
  degraded: boolean;
};

export type ArticleInput = {
  html: string;
  url?: string;
};

export type ExtractionDeps = {
  caches?: ExtractionCaches;
  context?: ExtractionContext;
  parse?: (html: string) => HtmlDocument;
  sleep?: (ms: number) => Promise<void>;
};

export type ArticleResult =
  | { ok: true; article: Article }
  | { ok: false; error: Error };

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function toInput(input: string | ArticleInput): ArticleInput {
  return typeof input === "string" ? { html: input } : input;
}

async function extractMetadataWithFallback(
  doc: HtmlDocument,
  ctx: ExtractionContext
): Promise<{ metadata: ArticleMetadata; degraded: boolean }> {
  const result = await withFallback(
    async () => withReadableFallback(doc, extractMetadata(doc)),
    (error) => {
      logger.warn("metadata extraction failed", ctx, { error: error.message });
      return { title: doc.title.trim(), byline: "", date: "" };
    }
  );
  return { metadata: result.value, degraded: !result.ok };
}

async function runExtraction(
  input: ArticleInput,
  options: ExtractionOptions,
  caches: ExtractionCaches,
  ctx: ExtractionContext,
  parse: (html: string) => HtmlDocument
): Promise<Article> {
  const doc = caches.parse(input.html, (html) => parseWithRepair(html, parse));
  const body = doc.body;
  const metadataSource = doc.clone();
  await yieldToEventLoop();

  if (ctx.host) applySiteRules(doc, ctx.host);
  const located = caches.locate(doc, { minScanTextLength: options.minScanTextLength });
  logger.debug("main content located", ctx, { tier: located.tier, score: located.score });
  await yieldToEventLoop();

  const subtree = located.node === body ? body.innerHTML : located.node.outerHTML;
  const contentDoc = parse(wrapInDocumentShell(subtree));
  simplifyDocument(
    contentDoc,
    resolvePipelineOptions({
      ...options.pipeline,
      addContentDigests: options.addContentDigests,
      addNodeIndexes: options.addNodeIndexes,
    })
  );
  const content = renderSimplified(contentDoc);
  const plainText = extractPlainText(contentDoc, { listsAsText: options.listsAsText });
  await yieldToEventLoop();

  const { metadata, degraded } = await extractMetadataWithFallback(metadataSource, ctx);
  return { ...metadata, content, plainText, mainContentTier: located.tier, degraded };
}

/**
 * Locates and simplifies the main content of one document. Timeouts are retried with backoff;
 * parse and structure failures are not. Caching is off unless `deps.caches` is given.
 */
export async function extractArticle(
  input: string | ArticleInput,
  options: Partial<ExtractionOptions> = {},
  deps: ExtractionDeps = {}
): Promise<Article> {
  const resolved = resolveExtractionOptions(options);
  const article = toInput(input);
  const ctx = deps.context ?? buildExtractionContext({ url: article.url });
  const caches = deps.caches ?? new ExtractionCaches({ enabled: false });
  const parse = deps.parse ?? ((html: string) => HtmlDocument.parse(html));
  const startedAt = Date.now();

  try {
    const result = await withRetry(
      resolved.retries,
      (attempt) => {
        if (attempt > 0) logger.warn("retrying extraction after timeout", ctx, { attempt });
        return withTimeout(resolved.timeoutMs, () => runExtraction(article, resolved, caches, ctx, parse));
      },
      {
        baseDelayMs: resolved.retryBaseDelayMs,
        retryOn: (error) => error instanceof TimeoutError,
        sleep: deps.sleep,
      }
    );
    logger.info("extraction finished", ctx, {
      tier: result.mainContentTier,
      contentChars: result.content.length,
      durationMs: Date.now() - startedAt,
    });
    return result;
  } catch (error) {
    logger.error("extraction failed", ctx, { error: toError(error).message });
    throw error;
  }
}

/** Extracts many documents with bounded concurrency; one failure does not affect the others. */
export async function extractArticles(
  inputs: ReadonlyArray<string | ArticleInput>,
  options: Partial<ExtractionOptions> = {},
  deps: Omit<ExtractionDeps, "context"> = {}
): Promise<ArticleResult[]> {
  const resolved = resolveExtractionOptions(options);
  return parallelProcessNodes(
    inputs,
    async (input): Promise<ArticleResult> => {
      try {
        return { ok: true, article: await extractArticle(input, resolved, deps) };
      } catch (error) {
        return { ok: false, error: toError(error) };
      }
    },
    { maxParallelism: resolved.maxParallelism }
  );
}
