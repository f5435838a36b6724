import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { createStoreCoordinator } from "@snipkeep/core/store";
import type { SnippetRepository } from "@snipkeep/core/storage";
import { healthRoute } from "./health.js";

describe("healthRoute", () => {
  const logger = pino({ level: "silent" });

  function createStore() {
    const repository: SnippetRepository = {
      baseDir: "/snippets",
      save: vi.fn(),
      loadAll: vi.fn().mockResolvedValue([]),
    };
    return createStoreCoordinator({ repository, logger });
  }

  it("GET /health returns 200", async () => {
    const app = healthRoute({
      version: "0.0.1",
      startedAt: new Date(),
      store: createStore(),
    });
    const res = await app.request("/health");
    expect(res.status).toBe(200);
  });

  it("body has status, version, uptime, snippets and store", async () => {
    const app = healthRoute({
      version: "0.0.1",
      startedAt: new Date(),
      store: createStore(),
    });
    const body = await (await app.request("/health")).json();

    expect(body).toEqual({
      status: "healthy",
      version: "0.0.1",
      uptime: 0,
      snippets: 0,
      store: {
        state: "idle",
        snippets: 0,
        pendingMutations: 0,
        lastReload: null,
        lastError: null,
        watching: false,
        watcherReloads: 0,
      },
    });
  });

  it("uptime increases over time", async () => {
    const past = new Date(Date.now() - 5000);
    const app = healthRoute({
      version: "0.0.1",
      startedAt: past,
      store: createStore(),
    });
    const body = await (await app.request("/health")).json();

    expect(body.uptime).toBeGreaterThanOrEqual(5);
  });

  it("reflects the last reload", async () => {
    const store = createStore();
    await store.reload();
    const app = healthRoute({ version: "0.0.1", startedAt: new Date(), store });
    const body = await (await app.request("/health")).json();

    expect(typeof body.store.lastReload).toBe("string");
  });
});
