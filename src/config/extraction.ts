import { z } from "zod";
import { pipelineOptionsSchema } from "../simplify/pipeline.js";

export const extractionOptionsSchema = z
  .object({
    timeoutMs: z.number().int().min(1).max(600_000),
    retries: z.number().int().min(0).max(10),
    retryBaseDelayMs: z.number().int().min(0).max(60_000),
    addContentDigests: z.boolean(),
    addNodeIndexes: z.boolean(),
    minScanTextLength: z.number().int().min(0),
    listsAsText: z.boolean(),
    maxParallelism: z.number().int().min(1).max(64),
    /** Stage toggles for the simplification pipeline; annotations come from the flags above. */
    pipeline: pipelineOptionsSchema.omit({ addContentDigests: true, addNodeIndexes: true }).partial(),
  })
  .strict();

export type ExtractionOptions = z.infer<typeof extractionOptionsSchema>;

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  timeoutMs: 30_000,
  retries: 2,
  retryBaseDelayMs: 100,
  addContentDigests: false,
  addNodeIndexes: false,
  minScanTextLength: 100,
  listsAsText: false,
  maxParallelism: 4,
  pipeline: {},
};

export type CacheConfig = {
  enabled: boolean;
  maxEntries: number;
  ttlMs: number;
};

function clampInt(value: unknown, min: number, max: number, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(n)));
}

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return fallback;
}

/** Merges `options` over the defaults and validates the result. Throws `ZodError`. */
export function resolveExtractionOptions(options: Partial<ExtractionOptions> = {}): ExtractionOptions {
  return extractionOptionsSchema.parse({ ...DEFAULT_EXTRACTION_OPTIONS, ...options });
}

export function readExtractionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExtractionOptions {
  const d = DEFAULT_EXTRACTION_OPTIONS;
  return {
    timeoutMs: clampInt(env.DISTILL_TIMEOUT_MS, 1, 600_000, d.timeoutMs),
    retries: clampInt(env.DISTILL_RETRIES, 0, 10, d.retries),
    retryBaseDelayMs: clampInt(env.DISTILL_RETRY_BASE_DELAY_MS, 0, 60_000, d.retryBaseDelayMs),
    addContentDigests: readFlag(env.DISTILL_CONTENT_DIGESTS, d.addContentDigests),
    addNodeIndexes: readFlag(env.DISTILL_NODE_INDEXES, d.addNodeIndexes),
    minScanTextLength: clampInt(env.DISTILL_MIN_SCAN_TEXT_LENGTH, 0, 100_000, d.minScanTextLength),
    listsAsText: readFlag(env.DISTILL_LISTS_AS_TEXT, d.listsAsText),
    maxParallelism: clampInt(env.DISTILL_MAX_PARALLELISM, 1, 64, d.maxParallelism),
    pipeline: {},
  };
}

export function readCacheConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  return {
    enabled: readFlag(env.DISTILL_CACHE_ENABLED, true),
    maxEntries: clampInt(env.DISTILL_CACHE_MAX_ENTRIES, 1, 100_000, 1000),
    ttlMs: clampInt(env.DISTILL_CACHE_TTL_MS, 1000, 86_400_000, 600_000),
  };
}
