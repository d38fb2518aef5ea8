export type ExtractionErrorCode =
  | "parse_error"
  | "structure_error"
  | "timeout"
  | "exhausted_fallback"
  | "retry_exhausted";

export type ExtractionStage = "parse" | "structure" | "locate" | "simplify" | "metadata" | "extract";

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly stage: ExtractionStage;

  constructor(
    code: ExtractionErrorCode,
    stage: ExtractionStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExtractionError";
    this.code = code;
    this.stage = stage;
  }
}

export class ParseError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse_error", "parse", message, options);
    this.name = "ParseError";
  }
}

export class StructureError extends ExtractionError {
  constructor(message: string) {
    super("structure_error", "structure", message);
    this.name = "StructureError";
  }
}

export class TimeoutError extends ExtractionError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, stage: ExtractionStage = "extract") {
    super("timeout", stage, `operation timed out after ${timeoutMs} ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ExhaustedFallbackError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("exhausted_fallback", "parse", message, options);
    this.name = "ExhaustedFallbackError";
  }
}

export class RetryExhaustedError extends ExtractionError {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    const stage = lastError instanceof ExtractionError ? lastError.stage : "extract";
    super("retry_exhausted", stage, `operation failed after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
