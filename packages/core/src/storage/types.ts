/** A persisted unit of text content plus metadata derived from its file. */
export interface Snippet {
  id: string;
  content: string;
  /** Derived display summary. Never persisted. */
  preview: string;
  created: Date;
  modified: Date;
  /** Absolute path of the backing `<id>.txt` file. */
  location: string;
}
