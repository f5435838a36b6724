export {
  SNIPPET_SUFFIX,
  newId,
  snippetFilename,
  idFromFilename,
} from "./identity.js";
export {
  PREVIEW_MAX_LINES,
  PREVIEW_MAX_CHARS,
  previewOf,
  truncateCodePoints,
} from "./preview.js";
