import { Hono } from "hono";
import { z } from "zod";
import type { Logger } from "pino";
import type { StoreCoordinator } from "@snipkeep/core/store";
import type { QueryResult } from "@snipkeep/core/search";
import type { Snippet } from "@snipkeep/core/storage";
import { createBodyLimit } from "../middleware/body-limit.js";
import { jsonError } from "../http/errors.js";

export interface SnippetRouteDeps {
  store: StoreCoordinator;
  logger: Logger;
  maxBodyBytes: number;
}

export const SaveSnippetBodySchema = z.object({
  content: z.string(),
});

const ListQuerySchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().positive().optional(),
});

function snippetJson(snippet: Snippet) {
  return {
    id: snippet.id,
    content: snippet.content,
    preview: snippet.preview,
    created: snippet.created.toISOString(),
    modified: snippet.modified.toISOString(),
    location: snippet.location,
  };
}

function resultJson(result: QueryResult) {
  return {
    id: result.snippet.id,
    preview: result.preview,
    highlights: result.highlights,
    created: result.snippet.created.toISOString(),
    modified: result.snippet.modified.toISOString(),
  };
}

export function snippetRoutes(deps: SnippetRouteDeps): Hono {
  const app = new Hono();

  // GET /v1/snippets?q=&limit=: filter the current snapshot
  app.get("/", (c) => {
    const parsed = ListQuerySchema.safeParse({
      q: c.req.query("q"),
      limit: c.req.query("limit"),
    });
    if (!parsed.success) {
      return jsonError(
        c,
        400,
        "INVALID_QUERY",
        parsed.error.issues[0]?.message ?? "Invalid query",
      );
    }

    const { q, limit } = parsed.data;
    const matches = deps.store.query(q);
    const results = limit === undefined ? matches : matches.slice(0, limit);

    return c.json({
      query: q,
      total: matches.length,
      results: results.map(resultJson),
    });
  });

  // POST /v1/snippets/reload: re-read the directory
  app.post("/reload", async (c) => {
    await deps.store.reload();
    return c.json({ snippets: deps.store.getStatus().snippets });
  });

  // GET /v1/snippets/:id: full content of one snippet
  app.get("/:id", (c) => {
    const id = c.req.param("id");
    const snippet = deps.store.get(id);
    if (!snippet) {
      return jsonError(c, 404, "SNIPPET_NOT_FOUND", `Snippet ${id} not found`, {
        id,
      });
    }
    return c.json(snippetJson(snippet));
  });

  // POST /v1/snippets: capture a new snippet
  app.post("/", createBodyLimit(deps.maxBodyBytes), async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch (err) {
      deps.logger.debug({ err }, "Rejected malformed snippet body");
      return jsonError(c, 400, "INVALID_BODY", "Request body must be JSON");
    }

    const parsed = SaveSnippetBodySchema.safeParse(raw);
    if (!parsed.success) {
      return jsonError(
        c,
        400,
        "INVALID_BODY",
        parsed.error.issues[0]?.message ?? "Invalid body",
      );
    }
    if (parsed.data.content.length === 0) {
      return jsonError(c, 400, "EMPTY_CONTENT", "Snippet content is empty");
    }

    const snippet = await deps.store.save(parsed.data.content);
    return c.json(snippetJson(snippet), 201);
  });

  return app;
}
