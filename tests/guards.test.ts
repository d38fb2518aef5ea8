import { afterEach, describe, expect, test, vi } from "vitest";
import { HtmlDocument } from "../src/dom/html-document.js";
import {
  ExhaustedFallbackError,
  ParseError,
  RetryExhaustedError,
  StructureError,
  TimeoutError,
} from "../src/errors.js";
import {
  parseWithRepair,
  withFallback,
  withRetry,
  withTimeout,
  wrapInDocumentShell,
} from "../src/resilience/guards.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("withTimeout", () => {
  test("returns the result when it settles in time", async () => {
    await expect(withTimeout(1_000, async () => "done")).resolves.toBe("done");
  });

  test("rejects with TimeoutError once the deadline passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(50, () => new Promise<string>(() => undefined), "locate");
    const assertion = expect(pending).rejects.toMatchObject({
      name: "TimeoutError",
      code: "timeout",
      stage: "locate",
      timeoutMs: 50,
    });
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  test("passes the primary failure through", async () => {
    await expect(
      withTimeout(1_000, async () => {
        throw new StructureError("no body");
      })
    ).rejects.toBeInstanceOf(StructureError);
  });
});

describe("withRetry", () => {
  test("backs off exponentially and reports the last error", async () => {
    const delays: number[] = [];
    const sleep = async (ms: number) => {
      delays.push(ms);
    };
    let calls = 0;
    const error = await withRetry(
      2,
      async () => {
        calls += 1;
        throw new TimeoutError(10);
      },
      { sleep }
    ).catch((caught: unknown) => caught);

    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.attempts).toBe(3);
    expect(error.lastError).toBeInstanceOf(TimeoutError);
    expect(error.stage).toBe("extract");
    expect(error.message).toBe("operation failed after 3 attempts: operation timed out after 10 ms");
  });

  test("returns as soon as an attempt succeeds", async () => {
    const attempts: number[] = [];
    const result = await withRetry(
      3,
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 1) throw new Error("flaky");
        return "ok";
      },
      { baseDelayMs: 5, sleep: async () => undefined }
    );
    expect(result).toBe("ok");
    expect(attempts).toEqual([0, 1]);
  });

  test("rethrows errors that retryOn rejects without retrying", async () => {
    let calls = 0;
    const failure = new StructureError("no body");
    await expect(
      withRetry(
        5,
        async () => {
          calls += 1;
          throw failure;
        },
        { retryOn: (error) => error instanceof TimeoutError, sleep: async () => undefined }
      )
    ).rejects.toBe(failure);
    expect(calls).toBe(1);
  });
});

describe("withFallback", () => {
  test("returns the primary value", async () => {
    await expect(withFallback(async () => 1, () => 2)).resolves.toEqual({ ok: true, value: 1 });
  });

  test("returns the fallback value with the primary error", async () => {
    const result = await withFallback(
      async (): Promise<string> => {
        throw new Error("primary down");
      },
      (error) => `fallback after ${error.message}`
    );
    expect(result.ok).toBe(false);
    expect(result.value).toBe("fallback after primary down");
    if (!result.ok) expect(result.error.message).toBe("primary down");
  });
});

describe("parseWithRepair", () => {
  test("retries a ParseError with a document shell", () => {
    const seen: string[] = [];
    const doc = parseWithRepair("<p>x</p>", (html) => {
      seen.push(html);
      if (seen.length === 1) throw new ParseError("tokenizer failed");
      return HtmlDocument.parse(html);
    });
    expect(seen).toEqual(["<p>x</p>", wrapInDocumentShell("<p>x</p>")]);
    expect(doc.innerHtml(doc.body)).toBe("<p>x</p>");
  });

  test("gives up with ExhaustedFallbackError when the repair fails too", () => {
    expect(() => parseWithRepair("a\u0000b", (html) => HtmlDocument.parse(html))).toThrow(
      ExhaustedFallbackError
    );
  });

  test("does not repair other failures", () => {
    const failure = new StructureError("no body");
    expect(() =>
      parseWithRepair("<p>x</p>", () => {
        throw failure;
      })
    ).toThrow(failure);
  });
});

describe("wrapInDocumentShell", () => {
  test("wraps a fragment", () => {
    expect(wrapInDocumentShell("<p>x</p>")).toBe("<html><head></head><body><p>x</p></body></html>");
  });
});
