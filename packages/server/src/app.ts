import { Hono } from "hono";
import { StoreError } from "@snipkeep/core/errors";
import type { StoreCoordinator } from "@snipkeep/core/store";
import type { Logger } from "pino";
import { healthRoute } from "./routes/health.js";
import { snippetRoutes } from "./routes/snippets.js";
import { createLocalOnlyMiddleware } from "./middleware/local-only.js";
import { errorBody, statusForStoreError } from "./http/errors.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  store: StoreCoordinator;
  maxBodyBytes: number;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Loopback daemon: nothing proxied or addressed by another hostname
  app.use("*", createLocalOnlyMiddleware());

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      store: deps.store,
    }),
  );

  app.route(
    "/v1/snippets",
    snippetRoutes({
      store: deps.store,
      logger: deps.logger,
      maxBodyBytes: deps.maxBodyBytes,
    }),
  );

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof StoreError) {
      const status = statusForStoreError(err);
      deps.logger.warn({ err }, err.message);
      return c.json(
        errorBody(status, err.errorCode, err.message, err.details),
        status,
      );
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      errorBody(500, "INTERNAL_ERROR", "Internal server error"),
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(errorBody(404, "NOT_FOUND", "Not found"), 404);
  });

  return app;
}
