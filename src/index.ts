export { ExtractionCaches, type ExtractionCacheStats, type ExtractionCachesOptions } from "./cache/extraction-caches.js";
export { contentFingerprint, documentCacheKey, documentSignatureKey, scoreCacheKey } from "./cache/fingerprint.js";
export { LruTtlCache, type CacheStats, type LruTtlCacheOptions } from "./cache/lru-cache.js";
export { batchProcessSelections, type SelectionAction } from "./concurrency/batch.js";
export { DEFAULT_PARALLEL_OPTIONS, parallelProcessNodes, type ParallelOptions } from "./concurrency/parallel.js";
export {
  DEFAULT_EXTRACTION_OPTIONS,
  readCacheConfigFromEnv,
  readExtractionConfigFromEnv,
  resolveExtractionOptions,
  type ExtractionOptions,
} from "./config/extraction.js";
export { HtmlDocument, nodePath, resolveNodePath, type NodePath } from "./dom/html-document.js";
export {
  ExhaustedFallbackError,
  ExtractionError,
  ParseError,
  RetryExhaustedError,
  StructureError,
  TimeoutError,
  type ExtractionErrorCode,
  type ExtractionStage,
} from "./errors.js";
export {
  extractArticle,
  extractArticles,
  type Article,
  type ArticleInput,
  type ArticleResult,
  type ExtractionDeps,
} from "./extract/article.js";
export { extractElement, type ExtractedElement, type SelectorScore } from "./extract/element.js";
export { extractByline, extractDate, extractMetadata, extractTitle, type ArticleMetadata } from "./extract/metadata.js";
export { extractPlainText, plainTextOf, type TextBlock } from "./extract/plain-text.js";
export { applySiteRules } from "./extract/site-rules.js";
export { FOCUS_ATTRIBUTE, locateMainContent, type LocatedContent, type LocateTier } from "./locate/main-content.js";
export { logger } from "./observability/logger.js";
export { DEFAULT_SCORING_WEIGHTS, scoreNode, type ScoringWeights } from "./scoring/density.js";
export { withFallback, withRetry, withTimeout, parseWithRepair, type FallbackResult } from "./resilience/guards.js";
export { calculateContentDigest, DIGEST_ATTRIBUTE, INDEX_ATTRIBUTE } from "./simplify/annotate.js";
export {
  DEFAULT_PIPELINE_OPTIONS,
  simplifyDocument,
  simplifyHtml,
  type PipelineOptions,
} from "./simplify/pipeline.js";
export { normalizeText, decodeHtmlEntities } from "./text/normalize.js";
export { countSentences, countWords, readingLevel } from "./text/tokenize.js";
