import { watch, type FSWatcher } from "node:fs";
import type { Logger } from "pino";
import { SNIPPET_SUFFIX } from "../codec/identity.js";
import type { ChangeListener, ChangeWatcher } from "./types.js";

export interface DirectoryWatcherOptions {
  dir: string;
  logger: Logger;
  /** Keep the event loop alive while watching. Defaults to false. */
  persistent?: boolean;
}

/**
 * Whether a change to `filename` can affect the snippet collection.
 * Platforms that omit the name report null, which always counts.
 */
export function isRelevantChange(filename: string | null): boolean {
  return filename === null || filename.endsWith(SNIPPET_SUFFIX);
}

/**
 * Watch the direct children of `dir` and signal on every change to a snippet
 * file. Signals carry no payload; the store re-reads the directory.
 */
export function createDirectoryWatcher(
  options: DirectoryWatcherOptions,
): ChangeWatcher {
  const { dir, logger } = options;
  let watcher: FSWatcher | null = null;
  let closed = false;

  return {
    start(onChange: ChangeListener): void {
      if (closed) throw new Error("Directory watcher is closed");
      if (watcher) throw new Error("Directory watcher already started");

      watcher = watch(
        dir,
        { persistent: options.persistent ?? false, recursive: false },
        (eventType, filename) => {
          if (closed || !isRelevantChange(filename)) return;
          logger.trace({ eventType, filename }, "Snippet directory changed");
          onChange();
        },
      );
      watcher.on("error", (err) => {
        logger.warn({ err, dir }, "Snippet directory watcher error");
      });
      logger.debug({ dir }, "Watching snippet directory");
    },

    close(): void {
      if (closed) return;
      closed = true;
      watcher?.close();
      watcher = null;
    },
  };
}
