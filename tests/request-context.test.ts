import { describe, expect, test } from "vitest";
import { buildExtractionContext, newRequestId } from "../src/observability/request-context.js";

describe("request context", () => {
  test("builds context from a source url", () => {
    const ctx = buildExtractionContext({ url: "https://news.example.com/a?b=1", requestId: "r1" });
    expect(ctx).toEqual({ requestId: "r1", url: "https://news.example.com/a?b=1", host: "news.example.com" });
  });

  test("leaves the host empty for a missing or invalid url", () => {
    expect(buildExtractionContext().host).toBe("");
    expect(buildExtractionContext({ url: "not a url" }).host).toBe("");
  });

  test("generates distinct request ids", () => {
    const a = buildExtractionContext().requestId;
    expect(a.length).toBeGreaterThan(0);
    expect(newRequestId()).not.toBe(a);
  });
});
