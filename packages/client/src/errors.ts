/**
 * Client error classes
 *
 * Collaborator failures are wrapped, never retried: the original error is
 * kept as `cause`.
 */

/**
 * Base error class for all client errors
 */
export class FlexError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "FlexError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a property configuration does not have the expected shape
 */
export class ConfigurationError extends FlexError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when an entity lacks a field its bucket path is built from
 */
export class MissingFieldError extends FlexError {
  constructor(
    public readonly property: string,
    public readonly field: string,
    public readonly entityKey: string,
  ) {
    super(
      `Entity ${entityKey} has no "${field}" field, needed for the bucket path of "${property}"`,
    );
    this.name = "MissingFieldError";
  }
}

/**
 * Thrown when a path field holds a value that cannot be a path component
 */
export class InvalidPathElementError extends FlexError {
  constructor(
    public readonly property: string,
    public readonly field: string,
    public readonly entityKey: string,
    reason: string,
  ) {
    super(
      `Field "${field}" of entity ${entityKey} cannot be used in the bucket path of "${property}": ${reason}`,
    );
    this.name = "InvalidPathElementError";
  }
}

/**
 * Thrown when the bucket storage client fails
 */
export class BucketIOError extends FlexError {
  constructor(
    public readonly path: string,
    public readonly operation: "read" | "write",
    cause?: Error,
  ) {
    super(
      `Bucket ${operation} failed for ${path}${cause ? `: ${cause.message}` : ""}`,
      cause,
    );
    this.name = "BucketIOError";
  }
}

/**
 * Thrown when the datastore client fails
 */
export class DatastoreIOError extends FlexError {
  constructor(
    public readonly operation: string,
    cause?: Error,
  ) {
    super(
      `Datastore ${operation} failed${cause ? `: ${cause.message}` : ""}`,
      cause,
    );
    this.name = "DatastoreIOError";
  }
}

/**
 * Normalize a thrown value into an Error for use as a cause
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
