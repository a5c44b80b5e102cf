/**
 * Storage error classes
 */

/**
 * Base error class for all storage errors
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "StorageError";
    // Maintain proper stack trace for V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an object is not found
 */
export class StorageNotFoundError extends StorageError {
  constructor(public readonly key: string) {
    super(`Object not found: ${key}`);
    this.name = "StorageNotFoundError";
  }
}

/**
 * Thrown when a key is invalid (e.g., path traversal attempt)
 */
export class StorageInvalidKeyError extends StorageError {
  constructor(
    public readonly key: string,
    message?: string,
  ) {
    super(message || `Invalid storage key: ${key}`);
    this.name = "StorageInvalidKeyError";
  }
}

/**
 * Thrown when a bucket URL names a scheme no adapter is registered for
 */
export class StorageUnsupportedSchemeError extends StorageError {
  constructor(
    public readonly url: string,
    public readonly scheme: string,
  ) {
    super(`No storage adapter for scheme "${scheme}": ${url}`);
    this.name = "StorageUnsupportedSchemeError";
  }
}
