/**
 * Middleware that rejects requests that did not come straight from this
 * machine.
 *
 * Detection:
 * - X-Forwarded-For header (the request went through a proxy)
 * - request URL naming anything but a loopback host (the Node adapter builds
 *   it from the Host header, so this catches DNS rebinding)
 */

import type { MiddlewareHandler } from "hono";
import { jsonError } from "../http/errors.js";

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

export function isLoopbackUrl(url: string): boolean {
  return LOOPBACK_HOSTS.has(new URL(url).hostname);
}

export function createLocalOnlyMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    if (c.req.header("x-forwarded-for") || !isLoopbackUrl(c.req.url)) {
      return jsonError(
        c,
        403,
        "LOCAL_ONLY",
        "This endpoint is only accessible locally",
      );
    }
    await next();
  };
}
