/**
 * Error codes raised by the drive.
 * Store failures are not wrapped: they reach the caller as thrown.
 */
export type DriveErrorCode =
  | "ENOENT"
  /** Reserved for duplicate detection; nothing raises it yet. */
  | "EEXIST"
  | "EAMBIGUOUS"
  | "ENOTDIR"
  | "EISDIR"
  | "EINVAL"
  | "EBADF"
  | "ECALLBACK";

/** Filesystem error with a POSIX-style error code. */
export class DriveError extends Error {
  constructor(
    public readonly code: DriveErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DriveError";
  }
}

/** A path segment that does not exist. `path` is the prefix up to that segment. */
export class NotFoundError extends DriveError {
  constructor(public readonly path: string) {
    super("ENOENT", `\`${path}' does not exist`);
    this.name = "NotFoundError";
  }
}

/** Raised when a caller-supplied visit callback throws. */
export class CallbackError extends DriveError {
  constructor(cause: unknown) {
    const inner = cause instanceof Error ? cause.message : String(cause);
    super("ECALLBACK", `callback failed: ${inner}`, { cause });
    this.name = "CallbackError";
  }
}
