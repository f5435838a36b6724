export type { ChangeListener, ChangeWatcher } from "./types.js";
export {
  createDirectoryWatcher,
  isRelevantChange,
  type DirectoryWatcherOptions,
} from "./fs-watcher.js";
