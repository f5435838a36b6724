export { SnippetIndex, type QueryResult } from "./snippet-index.js";
export { findHighlights, type HighlightRange } from "./highlight.js";
