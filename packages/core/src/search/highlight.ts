/** Half-open range of UTF-16 offsets into a preview string: `preview.slice(start, end)`. */
export interface HighlightRange {
  start: number;
  end: number;
}

/**
 * Lowercase `text` one code point at a time, recording for every UTF-16 unit
 * of the folded string the original range of the code point it came from.
 */
function foldWithOffsets(text: string): {
  folded: string;
  starts: number[];
  ends: number[];
} {
  let folded = "";
  const starts: number[] = [];
  const ends: number[] = [];
  let offset = 0;
  for (const char of text) {
    const lower = char.toLowerCase();
    for (let i = 0; i < lower.length; i++) {
      starts.push(offset);
      ends.push(offset + char.length);
    }
    folded += lower;
    offset += char.length;
  }
  return { folded, starts, ends };
}

/**
 * Locate every non-overlapping occurrence of `pattern` in `text`, folding case
 * with `toLowerCase` as the index filter does. Returns an empty list for an
 * empty pattern or no occurrence.
 */
export function findHighlights(text: string, pattern: string): HighlightRange[] {
  if (pattern.length === 0 || text.length === 0) return [];

  const needle = pattern.toLowerCase();
  const lowered = text.toLowerCase();
  const ranges: HighlightRange[] = [];

  if (lowered.length === text.length) {
    let from = 0;
    let at: number;
    while ((at = lowered.indexOf(needle, from)) !== -1) {
      ranges.push({ start: at, end: at + needle.length });
      from = at + needle.length;
    }
    return ranges;
  }

  // Folding changed the length (e.g. "İ"): map folded offsets back
  const { folded, starts, ends } = foldWithOffsets(text);
  let from = 0;
  let at: number;
  while ((at = folded.indexOf(needle, from)) !== -1) {
    ranges.push({ start: starts[at], end: ends[at + needle.length - 1] });
    from = at + needle.length;
  }
  return ranges;
}
