import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import {
  StoreClosedError,
  StoreError,
} from "@snipkeep/core/errors";

export interface ErrorBody {
  error: {
    code: number;
    errorCode: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function errorBody(
  code: number,
  errorCode: string,
  message: string,
  details?: Record<string, unknown>,
): ErrorBody {
  return {
    error: {
      code,
      errorCode,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

/** HTTP status for a store failure. */
export function statusForStoreError(err: StoreError): ContentfulStatusCode {
  return err instanceof StoreClosedError ? 503 : 500;
}

export function jsonError(
  c: Context,
  status: ContentfulStatusCode,
  errorCode: string,
  message: string,
  details?: Record<string, unknown>,
): Response {
  return c.json(errorBody(status, errorCode, message, details), status);
}
