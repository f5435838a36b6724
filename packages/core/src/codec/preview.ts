export const PREVIEW_MAX_LINES = 3;
export const PREVIEW_MAX_CHARS = 200;

/**
 * Derive the display preview of a snippet: the first three lines joined by a
 * single space, cut to at most 200 code points.
 *
 * A trailing newline does not open an extra empty line, and a `\r` before a
 * line break is dropped, so CRLF content previews the same as LF content.
 */
export function previewOf(content: string): string {
  if (content.length === 0) return "";

  const lines: string[] = [];
  let start = 0;
  while (lines.length < PREVIEW_MAX_LINES && start < content.length) {
    const newline = content.indexOf("\n", start);
    const end = newline === -1 ? content.length : newline;
    let line = content.slice(start, end);
    if (line.endsWith("\r")) line = line.slice(0, -1);
    lines.push(line);
    if (newline === -1) break;
    start = newline + 1;
  }

  return truncateCodePoints(lines.join(" "), PREVIEW_MAX_CHARS);
}

/** Cut `text` to `max` code points without splitting a surrogate pair. */
export function truncateCodePoints(text: string, max: number): string {
  // Fast path: fewer UTF-16 units than the limit means fewer code points too.
  if (text.length <= max) return text;

  let count = 0;
  let end = 0;
  for (const char of text) {
    if (count === max) break;
    end += char.length;
    count++;
  }
  return text.slice(0, end);
}
