import {
  ExhaustedFallbackError,
  ParseError,
  RetryExhaustedError,
  TimeoutError,
  toError,
  type ExtractionStage,
} from "../errors.js";
import type { HtmlDocument } from "../dom/html-document.js";

/**
 * Settles with `fn`'s result, or rejects with `TimeoutError` once `timeoutMs` passes. The
 * abandoned call keeps running until it settles on its own; its result is discarded.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  fn: () => Promise<T>,
  stage: ExtractionStage = "extract"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, stage)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export type RetryOptions = {
  baseDelayMs?: number;
  retryOn?: (error: Error) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_BASE_DELAY_MS = 100;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` once plus up to `retries` more times, waiting `baseDelayMs * 2^attempt` between
 * attempts. Errors rejected by `retryOn` are rethrown as they are.
 */
export async function withRetry<T>(
  retries: number,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const retryOn = options.retryOn ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;
  const maxRetries = Math.max(0, Math.floor(retries));

  let lastError = new Error("no attempt made");
  for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);
      if (!retryOn(lastError)) throw lastError;
      if (attempt < maxRetries) await sleep(baseDelayMs * 2 ** attempt);
    }
  }
  throw new RetryExhaustedError(maxRetries + 1, lastError);
}

export type FallbackResult<T> = { ok: true; value: T } | { ok: false; value: T; error: Error };

/** `fallbackFn` must not throw; its result is returned together with the primary's error. */
export async function withFallback<T>(
  fn: () => Promise<T>,
  fallbackFn: (error: Error) => T | Promise<T>
): Promise<FallbackResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    const cause = toError(error);
    return { ok: false, value: await fallbackFn(cause), error: cause };
  }
}

export function wrapInDocumentShell(html: string): string {
  return `<html><head></head><body>${html}</body></html>`;
}

/**
 * Parses `html`; on `ParseError` tries once more with the input wrapped in an explicit
 * document shell, then gives up with `ExhaustedFallbackError`.
 */
export function parseWithRepair(html: string, parse: (html: string) => HtmlDocument): HtmlDocument {
  try {
    return parse(html);
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    try {
      return parse(wrapInDocumentShell(html));
    } catch (repairError) {
      throw new ExhaustedFallbackError(`repair parse failed: ${toError(repairError).message}`, {
        cause: repairError,
      });
    }
  }
}
