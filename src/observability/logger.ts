import type { ExtractionContext } from "./request-context.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const DEFAULT_MAX_CHARS = 2000;
const REDACTED = "[REDACTED]";

function readMaxChars(): number {
  const raw = Number(process.env.DISTILL_LOG_MAX_CHARS);
  if (!Number.isFinite(raw)) return DEFAULT_MAX_CHARS;
  return Math.max(100, Math.floor(raw));
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function readLogLevel(): LogLevel {
  const raw = (process.env.DISTILL_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function replaceSecrets(text: string): string {
  return text.replace(/Bearer\s+[A-Za-z0-9._~+/=-]+/gi, `Bearer ${REDACTED}`);
}

export function truncateForLog(text: string, maxChars = readMaxChars()): string {
  if (text.length <= maxChars) return text;
  const suffix = "...[truncated]";
  if (maxChars <= suffix.length) return suffix.slice(0, maxChars);
  return `${text.slice(0, Math.max(0, maxChars - suffix.length))}${suffix}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function redactForLog(value: unknown): unknown {
  if (typeof value === "string") {
    return truncateForLog(replaceSecrets(value));
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactForLog(item));
  }
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (/authorization|token|cookie/i.test(key)) {
      out[key] = REDACTED;
      continue;
    }
    out[key] = redactForLog(raw);
  }
  return out;
}

export function toPathOnly(url: string): string {
  try {
    const parsed = new URL(url);
    return parsed.pathname;
  } catch {
    return url.split("?")[0] ?? url;
  }
}

type LogFields = Record<string, unknown>;

function normalizeFields(fields?: LogFields): LogFields {
  if (!fields) return {};
  const redacted = redactForLog(fields);
  return isRecord(redacted) ? redacted : {};
}

function emit(level: LogLevel, message: string, ctx?: ExtractionContext, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[readLogLevel()]) return;
  const payload: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    message,
    ...(ctx
      ? {
          requestId: ctx.requestId,
          url: toPathOnly(ctx.url),
          host: ctx.host,
        }
      : {}),
    ...normalizeFields(fields),
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export const logger = {
  debug(message: string, ctx?: ExtractionContext, fields?: LogFields): void {
    emit("debug", message, ctx, fields);
  },
  info(message: string, ctx?: ExtractionContext, fields?: LogFields): void {
    emit("info", message, ctx, fields);
  },
  warn(message: string, ctx?: ExtractionContext, fields?: LogFields): void {
    emit("warn", message, ctx, fields);
  },
  error(message: string, ctx?: ExtractionContext, fields?: LogFields): void {
    emit("error", message, ctx, fields);
  },
};
