import { ExtractionError } from "../errors.js";
import type { ExtractionContext } from "../observability/request-context.js";

type EnvelopeMeta = {
  requestId: string;
  durationMs: number;
};

export type CliSuccess = {
  ok: true;
  data: unknown;
  meta: EnvelopeMeta;
};

export type CliFailure = {
  ok: false;
  error: {
    code: string;
    message: string;
    stage?: string;
  };
  meta: EnvelopeMeta;
};

function requestIdOrDefault(ctx?: ExtractionContext): string {
  return ctx?.requestId ?? "";
}

function durationMsOrNow(startedAt: number, now: number): number {
  return Math.max(0, now - startedAt);
}

type EnvelopeOptions = {
  startedAt: number;
  context?: ExtractionContext;
  now?: number;
};

export function buildSuccessJson(data: unknown, options: EnvelopeOptions): string {
  const payload: CliSuccess = {
    ok: true,
    data,
    meta: {
      requestId: requestIdOrDefault(options.context),
      durationMs: durationMsOrNow(options.startedAt, options.now ?? Date.now()),
    },
  };
  return JSON.stringify(payload);
}

export function buildErrorJson(error: Error, options: EnvelopeOptions): string {
  const payload: CliFailure = {
    ok: false,
    error:
      error instanceof ExtractionError
        ? { code: error.code, message: error.message, stage: error.stage }
        : { code: "internal_error", message: error.message },
    meta: {
      requestId: requestIdOrDefault(options.context),
      durationMs: durationMsOrNow(options.startedAt, options.now ?? Date.now()),
    },
  };
  return JSON.stringify(payload);
}
