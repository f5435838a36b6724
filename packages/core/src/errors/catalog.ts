/**
 * Typed error catalog for the snippet store.
 *
 * Every error the store surfaces extends {@link StoreError} and serializes to
 * `{ error: { errorCode, message, details } }`. The HTTP adapter adds the
 * status code.
 */

export type IoOperation =
  | "mkdir"
  | "write"
  | "sync"
  | "rename"
  | "read"
  | "stat"
  | "list";

export class StoreError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

/** Directory creation, write, read, metadata or listing failure. */
export class StoreIoError extends StoreError {
  public readonly operation: IoOperation;
  public readonly path: string;
  /** OS error code (e.g. "ENOSPC"), when the cause carried one. */
  public readonly osCode?: string;

  constructor(
    operation: IoOperation,
    path: string,
    cause?: unknown,
    errorCode = "IO_ERROR",
  ) {
    const osCode = errnoCode(cause);
    const reason =
      cause === undefined
        ? ""
        : `: ${cause instanceof Error ? cause.message : String(cause)}`;
    super(
      errorCode,
      `Failed to ${operation} ${path}${reason}`,
      { operation, path, ...(osCode !== undefined && { osCode }) },
      { cause },
    );
    this.operation = operation;
    this.path = path;
    this.osCode = osCode;
  }
}

export class PermissionDeniedError extends StoreIoError {
  constructor(operation: IoOperation, path: string, cause?: unknown) {
    super(operation, path, cause, "PERMISSION_DENIED");
  }
}

/** The path does not exist. loadAll treats a vanished file as a benign race and skips it. */
export class NotFoundError extends StoreIoError {
  constructor(operation: IoOperation, path: string, cause?: unknown) {
    super(operation, path, cause, "NOT_FOUND");
  }
}

export class StoreClosedError extends StoreError {
  constructor(details?: Record<string, unknown>) {
    super("STORE_CLOSED", "Snippet store is closed", details);
  }
}

/** Extract `code` from a Node errno exception. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err) {
    const { code } = err as NodeJS.ErrnoException;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Wrap a raw file-system failure in the matching catalog type.
 * Errors that are already StoreErrors pass through unchanged.
 */
export function toStoreIoError(
  operation: IoOperation,
  path: string,
  err: unknown,
): StoreError {
  if (err instanceof StoreError) {
    return err;
  }
  switch (errnoCode(err)) {
    case "EACCES":
    case "EPERM":
      return new PermissionDeniedError(operation, path, err);
    case "ENOENT":
      return new NotFoundError(operation, path, err);
    default:
      return new StoreIoError(operation, path, err);
  }
}
