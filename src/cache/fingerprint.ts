import { createHash } from "node:crypto";

export const SIGNATURE_CHARS = 1024;
const BODY_SIGNATURE_CHARS = 512;

/**
 * SHA-256 of a bounded signature: the whole string up to 1024 characters, otherwise its first
 * 1024 characters plus its length. Two long inputs that share that prefix and length collide.
 */
export function contentFingerprint(input: string): string {
  const signature =
    input.length <= SIGNATURE_CHARS ? input : `${input.slice(0, SIGNATURE_CHARS)}:${input.length}`;
  return createHash("sha256").update(signature).digest("hex");
}

export function documentCacheKey(html: string): string {
  return `doc:${contentFingerprint(html)}`;
}

type DocumentShape = {
  title: string;
  bodyHtml: string;
  textLength: number;
};

export function documentSignatureKey(shape: DocumentShape): string {
  const signature = `${shape.title}|${shape.bodyHtml.slice(0, BODY_SIGNATURE_CHARS)}|${shape.textLength}`;
  return `node:${contentFingerprint(signature)}`;
}

export function scoreCacheKey(outerHtml: string): string {
  return `score:${contentFingerprint(outerHtml)}`;
}

export function selectionCacheKey(documentKey: string, selector: string): string {
  return `select:${contentFingerprint(`${documentKey}|${selector}`)}`;
}
