import { bodyLimit } from 'hono/body-limit'
import type { MiddlewareHandler } from 'hono'

/**
 * Creates a Hono body-limit middleware that returns 413 JSON on overflow.
 */
export function createBodyLimit(maxSize: number): MiddlewareHandler {
  return bodyLimit({
    maxSize,
    onError: (c) => {
      return c.json(
        {
          error: {
            code: 413,
            errorCode: 'CONTENT_TOO_LARGE',
            message: `Request body exceeds maximum size of ${maxSize} bytes`,
          },
        },
        413,
      )
    },
  })
}
