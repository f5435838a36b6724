import { randomUUID } from "node:crypto";

/** Suffix of every snippet file in the store directory. */
export const SNIPPET_SUFFIX = ".txt";

/** Fresh 128-bit random identifier, textually encoded as a v4 UUID. */
export function newId(): string {
  return randomUUID();
}

/** "3f2c…" → "3f2c….txt" */
export function snippetFilename(id: string): string {
  return id + SNIPPET_SUFFIX;
}

/**
 * "3f2c….txt" → "3f2c…". Returns null for names the store does not own
 * (other suffixes, temp files, a bare ".txt").
 */
export function idFromFilename(filename: string): string | null {
  if (!filename.endsWith(SNIPPET_SUFFIX)) return null;
  const id = filename.slice(0, -SNIPPET_SUFFIX.length);
  return id.length > 0 ? id : null;
}
