import { afterEach, describe, expect, test, vi } from "vitest";
import { logger, readLogLevel, redactForLog, toPathOnly, truncateForLog } from "../src/observability/logger.js";
import { buildExtractionContext } from "../src/observability/request-context.js";

const savedLevel = process.env.DISTILL_LOG_LEVEL;

afterEach(() => {
  vi.restoreAllMocks();
  if (savedLevel === undefined) {
    delete process.env.DISTILL_LOG_LEVEL;
  } else {
    process.env.DISTILL_LOG_LEVEL = savedLevel;
  }
});

describe("logger helpers", () => {
  test("redacts token and authorization fields", () => {
    const input = {
      Authorization: "Bearer test-secret",
      nested: { token: "test-secret", text: "use Bearer test-secret here" },
      list: ["Bearer test-secret"],
    };

    expect(redactForLog(input)).toEqual({
      Authorization: "[REDACTED]",
      nested: { token: "[REDACTED]", text: "use Bearer [REDACTED] here" },
      list: ["Bearer [REDACTED]"],
    });
  });

  test("truncate limits long text", () => {
    expect(truncateForLog("a".repeat(50), 20)).toBe("aaaaaa...[truncated]");
    expect(truncateForLog("short", 20)).toBe("short");
  });

  test("keeps only the path of a url", () => {
    expect(toPathOnly("https://example.com/a/b?token=test-secret")).toBe("/a/b");
    expect(toPathOnly("relative/page?q=1")).toBe("relative/page");
  });

  test("reads the level from the environment", () => {
    process.env.DISTILL_LOG_LEVEL = " WARN ";
    expect(readLogLevel()).toBe("warn");
    process.env.DISTILL_LOG_LEVEL = "verbose";
    expect(readLogLevel()).toBe("info");
  });
});

describe("logger", () => {
  test("filters below the configured level", () => {
    process.env.DISTILL_LOG_LEVEL = "warn";
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test("writes one JSON line with context and redacted fields", () => {
    process.env.DISTILL_LOG_LEVEL = "debug";
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const ctx = buildExtractionContext({ url: "https://example.com/post?id=7", requestId: "req-1" });

    logger.error("extraction failed", ctx, { cookie: "test-secret", attempt: 2 });

    expect(error).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "error",
      message: "extraction failed",
      requestId: "req-1",
      url: "/post",
      host: "example.com",
      cookie: "[REDACTED]",
      attempt: 2,
    });
  });
});
