/**
 * Datastore error classes
 */

/**
 * Base error class for all datastore errors
 */
export class DatastoreError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "DatastoreError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an operation needs a complete key (with id or name)
 */
export class DatastoreIncompleteKeyError extends DatastoreError {
  constructor(public readonly key: string) {
    super(`Key has no id or name: ${key}`);
    this.name = "DatastoreIncompleteKeyError";
  }
}

/**
 * Thrown when a property value cannot be stored or read back
 */
export class DatastoreValueError extends DatastoreError {
  constructor(
    public readonly field: string,
    message?: string,
  ) {
    super(message || `Unsupported value for property "${field}"`);
    this.name = "DatastoreValueError";
  }
}
