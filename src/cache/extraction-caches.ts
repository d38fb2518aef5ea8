import {
  HtmlDocument,
  nodePath,
  resolveNodePath,
  type NodePath,
} from "../dom/html-document.js";
import {
  DEFAULT_MIN_SCAN_TEXT_LENGTH,
  locateMainContent,
  type LocateOptions,
  type LocatedContent,
  type LocateTier,
} from "../locate/main-content.js";
import { DEFAULT_SCORING_WEIGHTS, scoreNode, type ScoringWeights } from "../scoring/density.js";
import {
  documentCacheKey,
  documentSignatureKey,
  scoreCacheKey,
  selectionCacheKey,
} from "./fingerprint.js";
import { LruTtlCache, type CacheStats } from "./lru-cache.js";

export type ExtractionCachesOptions = {
  enabled: boolean;
  maxEntries: number;
  ttlMs: number;
  sweepIntervalMs?: number;
  now?: () => number;
};

export const DEFAULT_EXTRACTION_CACHES_OPTIONS: ExtractionCachesOptions = {
  enabled: true,
  maxEntries: 1000,
  ttlMs: 10 * 60 * 1000,
};

type LocatedEntry = {
  path: NodePath;
  tier: LocateTier;
  score: number;
};

type SelectionEntry = {
  paths: NodePath[];
};

type ScoreEntry = {
  score: number;
};

export type ExtractionCacheStats = {
  documents: CacheStats;
  located: CacheStats;
  scores: CacheStats;
  selections: CacheStats;
};

function signatureKey(doc: HtmlDocument): string {
  const body = doc.body;
  return documentSignatureKey({
    title: doc.title,
    bodyHtml: body.innerHTML,
    textLength: (body.textContent ?? "").length,
  });
}

/**
 * Memoizes parsing, main-content location, scoring and selector queries. One instance is built
 * per process and handed to every caller; tests build their own.
 */
export class ExtractionCaches {
  private readonly enabled: boolean;
  private readonly documents: LruTtlCache<HtmlDocument>;
  private readonly located: LruTtlCache<LocatedEntry>;
  private readonly scores: LruTtlCache<ScoreEntry>;
  private readonly selections: LruTtlCache<SelectionEntry>;

  constructor(options: Partial<ExtractionCachesOptions> = {}) {
    const resolved = { ...DEFAULT_EXTRACTION_CACHES_OPTIONS, ...options };
    this.enabled = resolved.enabled;
    const cacheOptions = {
      maxEntries: resolved.maxEntries,
      defaultTtlMs: resolved.ttlMs,
      sweepIntervalMs: resolved.enabled ? resolved.sweepIntervalMs : 0,
      now: resolved.now,
    };
    this.documents = new LruTtlCache(cacheOptions);
    this.located = new LruTtlCache(cacheOptions);
    this.scores = new LruTtlCache(cacheOptions);
    this.selections = new LruTtlCache(cacheOptions);
  }

  /** A private copy of the parsed document; callers may mutate it freely. */
  parse(html: string, parser: (html: string) => HtmlDocument = HtmlDocument.parse): HtmlDocument {
    if (!this.enabled) return parser(html);
    const key = documentCacheKey(html);
    const cached = this.documents.get(key);
    if (cached) return cached.clone();
    const parsed = parser(html);
    this.documents.set(key, parsed.clone());
    return parsed;
  }

  scorer(weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): (element: Element) => number {
    if (!this.enabled || weights !== DEFAULT_SCORING_WEIGHTS) {
      return (element) => scoreNode(element, weights);
    }
    return (element) => this.score(element);
  }

  score(element: Element): number {
    if (!this.enabled) return scoreNode(element);
    const key = scoreCacheKey(element.outerHTML);
    const cached = this.scores.get(key);
    if (cached) return cached.score;
    const score = scoreNode(element);
    this.scores.set(key, { score });
    return score;
  }

  /**
   * Located node of `doc`, looked up by document signature and scan threshold and resolved
   * against `doc`. Custom weights or a custom scorer bypass the cache.
   */
  locate(doc: HtmlDocument, options: LocateOptions = {}): LocatedContent {
    const scorer = options.scorer ?? this.scorer(options.weights);
    const customScoring =
      options.scorer !== undefined ||
      (options.weights !== undefined && options.weights !== DEFAULT_SCORING_WEIGHTS);
    if (!this.enabled || customScoring) return locateMainContent(doc, { ...options, scorer });

    const minScanTextLength = options.minScanTextLength ?? DEFAULT_MIN_SCAN_TEXT_LENGTH;
    const key = `${signatureKey(doc)}|scan:${minScanTextLength}`;
    const cached = this.located.get(key);
    const node = cached ? resolveNodePath(doc.root, cached.path) : null;
    if (cached && node) return { node, tier: cached.tier, score: cached.score };

    const located = locateMainContent(doc, { ...options, scorer });
    const path = nodePath(doc.root, located.node);
    if (path) this.located.set(key, { path, tier: located.tier, score: located.score });
    return located;
  }

  select(doc: HtmlDocument, selector: string): Element[] {
    if (!this.enabled) return doc.select(selector);
    const key = selectionCacheKey(signatureKey(doc), selector);
    const cached = this.selections.get(key);
    if (cached) {
      const resolved = cached.paths.map((path) => resolveNodePath(doc.root, path));
      const nodes = resolved.filter((node): node is Element => node !== null);
      if (nodes.length === resolved.length) return nodes;
    }
    const nodes = doc.select(selector);
    const paths = nodes.map((node) => nodePath(doc.root, node));
    this.selections.set(key, { paths: paths.filter((path): path is NodePath => path !== null) });
    return nodes;
  }

  stats(): ExtractionCacheStats {
    return {
      documents: this.documents.stats(),
      located: this.located.stats(),
      scores: this.scores.stats(),
      selections: this.selections.stats(),
    };
  }

  clear(): void {
    this.documents.clear();
    this.located.clear();
    this.scores.clear();
    this.selections.clear();
  }

  close(): void {
    this.documents.close();
    this.located.close();
    this.scores.close();
    this.selections.close();
  }
}
