/**
 * @datastore-flex/storage/core - Bucket adapter contract
 *
 * An adapter is bound to one bucket root (e.g. `gs://bucket/prefix`) and
 * addresses objects by keys relative to that root.
 */

/**
 * What an adapter reports about a stored object
 */
export interface ObjectMetadata {
  contentType: string;

  /** Stored size in bytes, after any compression */
  size: number;

  /** e.g. "gzip"; absent when the bytes are stored as written */
  contentEncoding?: string;

  cacheControl?: string;

  /** Last write time */
  updatedAt: Date;
}

export interface WriteOptions {
  contentType: string;
  /** Encoding already applied to the buffer */
  contentEncoding?: string;
  cacheControl?: string;
}

/**
 * Logger shape adapters write to; a pino logger fits
 */
export interface StorageLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export interface StorageConfig {
  logger?: StorageLogger;
}

/**
 * Bucket port used by the datastore client
 *
 * Keys are relative to the adapter's bucket root, e.g. `g1/u1`.
 */
export interface Storage {
  /**
   * Write an object, replacing any object at the key
   */
  writeBuffer(
    key: string,
    buffer: Buffer,
    options: WriteOptions,
  ): Promise<void>;

  /**
   * Read the stored bytes and the metadata they were written with
   *
   * No content decoding is applied.
   *
   * @throws StorageNotFoundError if nothing is stored at the key
   */
  readBuffer(
    key: string,
  ): Promise<{ buffer: Buffer; metadata: ObjectMetadata }>;

  /**
   * @returns The object's metadata, or null if nothing is stored at the key
   */
  head(key: string): Promise<ObjectMetadata | null>;

  exists(key: string): Promise<boolean>;

  /**
   * Release the adapter's resources
   */
  close(): Promise<void>;
}
