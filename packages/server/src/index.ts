import { serve } from "@hono/node-server";
import {
  loadConfig,
  resolveRootPath,
  ROOT_PATH_ENV,
} from "@snipkeep/core/config";
import {
  checkRunningServer,
  writePidFile,
  removePidFile,
} from "@snipkeep/runtime";
import { createServer } from "./bootstrap.js";

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env[ROOT_PATH_ENV];
  const config = await loadConfig({ rootPath });

  const storageRoot = resolveRootPath(rootPath);
  const running = await checkRunningServer(storageRoot);
  if (running) {
    throw new Error(
      `snipkeep is already running (pid ${running.pid}, http://${running.host}:${running.port})`,
    );
  }

  const context = await createServer(config, { rootPath });
  const { app, logger, version, snippetsDir } = context;
  const { host, port } = config.server;

  const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    logger.info(
      { host, port: info.port, version, snippetsDir },
      "HTTP server started",
    );
    writePidFile(storageRoot, {
      pid: process.pid,
      host,
      port: info.port,
      version,
      startedAt: context.startedAt.toISOString(),
      snippetsDir,
    }).catch((err: unknown) => {
      logger.warn({ err }, "Failed to write PID file");
    });
  });

  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received, draining connections");

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    try {
      await removePidFile(storageRoot);
    } catch (err) {
      logger.warn({ err }, "Failed to remove PID file");
    }

    // Let queued saves land before the listener goes away
    await context.cleanup();

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start snipkeep:", err);
  process.exit(1);
});
