import { createRequire } from "node:module";
import type { Hono } from "hono";
import type { SnipkeepConfig } from "@snipkeep/core/schemas";
import {
  resolveRootPath,
  resolveSnippetsDir,
} from "@snipkeep/core/config";
import { createLogger, type Logger } from "@snipkeep/core/logger";
import { openSnippetRepository } from "@snipkeep/core/storage";
import {
  createStoreCoordinator,
  type StoreCoordinator,
} from "@snipkeep/core/store";
import { createDirectoryWatcher } from "@snipkeep/core/watcher";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: SnipkeepConfig;
  version: string;
  startedAt: Date;
  storageRoot: string;
  snippetsDir: string;
  store: StoreCoordinator;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Replaces the logger built from `config.logging` */
  logger?: Logger;
}

/**
 * Open the snippet store under the configured directory, load it, start the
 * watcher and build the HTTP app. Nothing listens until the caller serves
 * `app.fetch`.
 */
export async function createServer(
  config: SnipkeepConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const startedAt = new Date();

  const storageRoot = resolveRootPath(options?.rootPath);
  const snippetsDir = resolveSnippetsDir(config.storage.dir, storageRoot);

  const repository = await openSnippetRepository({
    baseDir: snippetsDir,
    logger: logger.child({ component: "repository" }),
  });

  const store = createStoreCoordinator({
    repository,
    logger: logger.child({ component: "store" }),
    debounceMs: config.watcher.debounceMs,
  });

  await store.reload();
  logger.info(
    { snippetsDir, snippets: store.getStatus().snippets },
    "Snippet store loaded",
  );

  if (config.watcher.enabled) {
    store.attachWatcher(
      createDirectoryWatcher({
        dir: snippetsDir,
        logger: logger.child({ component: "watcher" }),
      }),
    );
  } else {
    logger.info("Directory watcher disabled; use POST /v1/snippets/reload");
  }

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    store,
    maxBodyBytes: config.server.maxBodyBytes,
  });

  return {
    app,
    logger,
    config,
    version: pkg.version,
    startedAt,
    storageRoot,
    snippetsDir,
    store,
    cleanup: () => store.close(),
  };
}
