import type { Snippet } from "../storage/types.js";
import { findHighlights, type HighlightRange } from "./highlight.js";

export interface QueryResult {
  snippet: Snippet;
  preview: string;
  /** Ranges of `preview` inside a match. Empty when the match lies past the preview. */
  highlights: HighlightRange[];
}

/** One immutable generation of the index. Swapped as a whole, never edited. */
interface IndexSnapshot {
  readonly snippets: readonly Snippet[];
  /** Lowercased content, parallel to `snippets` */
  readonly searchKeys: readonly string[];
}

const EMPTY: IndexSnapshot = Object.freeze({
  snippets: Object.freeze([]),
  searchKeys: Object.freeze([]),
});

/**
 * In-memory view of the snippet collection, newest first.
 *
 * Mutations build a new snapshot and swap the reference, so a reader holding
 * the previous snapshot keeps a consistent collection.
 */
export class SnippetIndex {
  private current: IndexSnapshot = EMPTY;

  get size(): number {
    return this.current.snippets.length;
  }

  /** The current collection, in index order. */
  snapshot(): readonly Snippet[] {
    return this.current.snippets;
  }

  get(id: string): Snippet | undefined {
    return this.current.snippets.find((s) => s.id === id);
  }

  /** Replace the whole collection. `records` must already be newest first. */
  replaceAll(records: readonly Snippet[]): void {
    this.current = Object.freeze({
      snippets: Object.freeze([...records]),
      searchKeys: Object.freeze(records.map((s) => s.content.toLowerCase())),
    });
  }

  /** Add a just-saved snippet at the head. */
  insertFront(record: Snippet): void {
    const { snippets, searchKeys } = this.current;
    this.current = Object.freeze({
      snippets: Object.freeze([record, ...snippets]),
      searchKeys: Object.freeze([record.content.toLowerCase(), ...searchKeys]),
    });
  }

  /**
   * Case-insensitive substring search over full content. Matches keep index
   * order; an empty pattern returns everything.
   */
  query(pattern: string): QueryResult[] {
    const { snippets, searchKeys } = this.current;

    if (pattern.length === 0) {
      return snippets.map((snippet) => ({
        snippet,
        preview: snippet.preview,
        highlights: [],
      }));
    }

    const needle = pattern.toLowerCase();
    const results: QueryResult[] = [];
    for (let i = 0; i < snippets.length; i++) {
      if (!searchKeys[i].includes(needle)) continue;
      const snippet = snippets[i];
      results.push({
        snippet,
        preview: snippet.preview,
        highlights: findHighlights(snippet.preview, pattern),
      });
    }
    return results;
  }
}
