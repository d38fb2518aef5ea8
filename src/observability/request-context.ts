export type ExtractionContext = {
  requestId: string;
  url: string;
  host: string;
};

type ContextInput = {
  url?: string;
  requestId?: string;
};

function randomId(): string {
  return Math.random().toString(36).slice(2, 10);
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "";
  }
}

export function newRequestId(): string {
  return `${Date.now().toString(36)}-${randomId()}`;
}

export function buildExtractionContext(input: ContextInput = {}): ExtractionContext {
  const url = input.url ?? "";
  return {
    requestId: input.requestId ?? newRequestId(),
    url,
    host: hostOf(url),
  };
}
