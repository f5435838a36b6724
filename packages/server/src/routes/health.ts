import { Hono } from "hono";
import type { StoreCoordinator } from "@snipkeep/core/store";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  store: StoreCoordinator;
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();
    const store = deps.store.getStatus();

    return c.json({
      status: store.state === "closed" ? "closing" : "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
      snippets: store.snippets,
      store,
    });
  });

  return app;
}
