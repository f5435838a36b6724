import type { Logger } from "pino";
import { StoreClosedError, StoreError } from "../errors/catalog.js";
import { SnippetIndex, type QueryResult } from "../search/index.js";
import type { SnippetRepository } from "../storage/repository.js";
import type { Snippet } from "../storage/types.js";
import type { ChangeWatcher } from "../watcher/types.js";
import { ChangeChannel } from "./change-channel.js";
import { MutationQueue } from "./mutation-queue.js";
import {
  StoreStateMachine,
  type StateChangeListener,
  type StoreState,
} from "./state-machine.js";

export interface StoreCoordinatorDeps {
  repository: SnippetRepository;
  logger: Logger;
  /** Defaults to a fresh, empty index */
  index?: SnippetIndex;
  /** Quiet period applied to watcher signals before reloading */
  debounceMs?: number;
}

export interface StoreErrorInfo {
  errorCode: string;
  message: string;
  timestamp: string; // ISO 8601
}

/** Store status for GET /health */
export interface StoreStatus {
  state: StoreState;
  snippets: number;
  pendingMutations: number;
  lastReload: string | null; // ISO 8601
  lastError: StoreErrorInfo | null;
  watching: boolean;
  watcherReloads: number;
}

export interface StoreCoordinator {
  /** Persist a new snippet; visible to the very next query. */
  save(content: string): Promise<Snippet>;

  /** Re-read the directory and swap the index. Keeps the old index on failure. */
  reload(): Promise<void>;

  /** Filter the current snapshot. Never waits for disk I/O. */
  query(pattern: string): QueryResult[];

  /** Look up a snippet in the current snapshot. */
  get(id: string): Snippet | undefined;

  /** Route change signals from `watcher` into debounced reloads. */
  attachWatcher(watcher: ChangeWatcher): void;

  getState(): StoreState;

  onStateChange(listener: StateChangeListener): () => void;

  getStatus(): StoreStatus;

  /** Stop the watcher, let queued mutations finish, refuse new ones. */
  close(): Promise<void>;
}

export function createStoreCoordinator(
  deps: StoreCoordinatorDeps,
): StoreCoordinator {
  const { repository, logger } = deps;
  const index = deps.index ?? new SnippetIndex();
  const machine = new StoreStateMachine();
  const queue = new MutationQueue();

  let lastReload: string | null = null;
  let lastError: StoreErrorInfo | null = null;
  let watcher: ChangeWatcher | null = null;
  let channel: ChangeChannel | null = null;
  let watcherReloads = 0;
  let closing: Promise<void> | null = null;

  function recordError(err: unknown): void {
    lastError = {
      errorCode: err instanceof StoreError ? err.errorCode : "INTERNAL_ERROR",
      message: err instanceof Error ? err.message : String(err),
      timestamp: new Date().toISOString(),
    };
  }

  /** Serialize a disk-affecting operation behind every earlier one. */
  function mutate<T>(operation: string, task: () => Promise<T>): Promise<T> {
    if (closing) {
      return Promise.reject(new StoreClosedError({ operation }));
    }
    return queue.run(async () => {
      machine.transition("mutating", operation);
      try {
        return await task();
      } finally {
        machine.transition("idle");
      }
    });
  }

  const coordinator: StoreCoordinator = {
    save(content: string): Promise<Snippet> {
      return mutate("save", async () => {
        try {
          const snippet = await repository.save(content);
          index.insertFront(snippet);
          logger.debug(
            { id: snippet.id, bytes: Buffer.byteLength(content) },
            "Snippet saved",
          );
          return snippet;
        } catch (err) {
          recordError(err);
          logger.error({ err }, "Snippet save failed");
          throw err;
        }
      });
    },

    reload(): Promise<void> {
      return mutate("reload", async () => {
        const startedAt = Date.now();
        try {
          const snippets = await repository.loadAll();
          index.replaceAll(snippets);
          lastReload = new Date().toISOString();
          logger.debug(
            { snippets: snippets.length, durationMs: Date.now() - startedAt },
            "Snippet index reloaded",
          );
        } catch (err) {
          recordError(err);
          logger.error(
            { err, snippets: index.size },
            "Snippet reload failed, keeping previous index",
          );
          throw err;
        }
      });
    },

    query(pattern: string): QueryResult[] {
      return index.query(pattern);
    },

    get(id: string): Snippet | undefined {
      return index.get(id);
    },

    attachWatcher(next: ChangeWatcher): void {
      if (closing) {
        throw new StoreClosedError({ operation: "attachWatcher" });
      }
      if (watcher) {
        throw new Error("A change watcher is already attached");
      }

      const changes = new ChangeChannel({
        debounceMs: deps.debounceMs,
        onDrain: async () => {
          watcherReloads++;
          await coordinator.reload();
        },
        onError: (err) => {
          // Already recorded and logged by reload(); nothing to rethrow to
          logger.debug({ err }, "Watcher-triggered reload failed");
        },
      });

      watcher = next;
      channel = changes;
      next.start(() => changes.notify());
    },

    getState(): StoreState {
      return machine.getState();
    },

    onStateChange(listener: StateChangeListener): () => void {
      // A listener failure must not leave the machine mid-transition
      return machine.onStateChange((event) => {
        try {
          listener(event);
        } catch (err) {
          logger.warn(
            { err, from: event.from, to: event.to },
            "Store state listener failed",
          );
        }
      });
    },

    getStatus(): StoreStatus {
      return {
        state: machine.getState(),
        snippets: index.size,
        pendingMutations: queue.size,
        lastReload,
        lastError,
        watching: watcher !== null,
        watcherReloads,
      };
    },

    close(): Promise<void> {
      if (closing) return closing;

      closing = (async () => {
        watcher?.close();
        watcher = null;
        if (channel) {
          await channel.close();
          channel = null;
        }
        await queue.drain();
        machine.transition("closed", "close");
        logger.debug("Snippet store closed");
      })();

      return closing;
    },
  };

  return coordinator;
}
