/**
 * Google Cloud Storage bucket adapter
 *
 * Backs `gs://` bucket URLs through @google-cloud/storage. Authentication,
 * transport and retries are left to the client library.
 */

import { Storage as GoogleCloudStorage } from "@google-cloud/storage";
import type { StorageOptions } from "@google-cloud/storage";
import {
  StorageError,
  StorageInvalidKeyError,
  StorageNotFoundError,
} from "../../core/errors.js";
import { isValidKey } from "../../core/urls.js";
import type {
  ObjectMetadata,
  Storage,
  StorageConfig,
  StorageLogger,
  WriteOptions,
} from "../../core/types.js";

// ============================================================================
// Client surface
// ============================================================================

/**
 * Object metadata as reported by GCS. Values are checked before use.
 */
export interface GcsObjectMetadata {
  contentType?: unknown;
  contentEncoding?: unknown;
  cacheControl?: unknown;
  size?: unknown;
  generation?: unknown;
  updated?: unknown;
}

export interface GcsSaveOptions {
  contentType?: string;
  resumable?: boolean;
  metadata?: {
    contentEncoding?: string;
    cacheControl?: string;
  };
}

/**
 * The parts of a @google-cloud/storage `File` this adapter uses
 */
export interface GcsFileHandle {
  save(data: Buffer, options?: GcsSaveOptions): Promise<void>;
  download(options?: { decompress?: boolean }): Promise<[Buffer]>;
  getMetadata(): Promise<[GcsObjectMetadata, ...unknown[]]>;
  exists(): Promise<[boolean]>;
}

/**
 * The parts of a @google-cloud/storage `Bucket` this adapter uses
 */
export interface GcsBucketHandle {
  readonly name: string;
  file(name: string, options?: { generation?: string }): GcsFileHandle;
}

/**
 * GCS storage configuration
 */
export interface GcsStorageConfig extends StorageConfig {
  /** GCS bucket name */
  bucket: string;

  /** Optional key prefix within the bucket */
  prefix?: string;

  /** Options for the @google-cloud/storage client (projectId, keyFilename, ...) */
  clientOptions?: StorageOptions;

  /** Pre-built bucket handle; takes precedence over clientOptions */
  bucketHandle?: GcsBucketHandle;
}

/**
 * No-op logger for when none is provided
 */
const noopLogger: StorageLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Google Cloud Storage implementation
 */
export class GcsStorage implements Storage {
  private readonly bucket: GcsBucketHandle;
  private readonly prefix: string;
  private readonly logger: StorageLogger;

  constructor(config: GcsStorageConfig) {
    this.bucket =
      config.bucketHandle ??
      new GoogleCloudStorage(config.clientOptions).bucket(config.bucket);
    this.prefix = (config.prefix ?? "").replace(/^\/+|\/+$/g, "");
    this.logger = config.logger ?? noopLogger;

    this.logger.debug(
      { bucket: config.bucket, prefix: this.prefix },
      "GcsStorage initialized",
    );
  }

  /**
   * Map a storage key to the object name inside the bucket
   */
  private objectName(key: string): string {
    if (!isValidKey(key)) {
      throw new StorageInvalidKeyError(key, "Invalid storage key format");
    }
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  // ---- Write Operations ----

  async writeBuffer(
    key: string,
    buffer: Buffer,
    options: WriteOptions,
  ): Promise<void> {
    const name = this.objectName(key);

    try {
      await this.bucket.file(name).save(buffer, {
        contentType: options.contentType,
        resumable: false,
        metadata: {
          contentEncoding: options.contentEncoding,
          cacheControl: options.cacheControl,
        },
      });
    } catch (error) {
      throw this.wrapError(key, "write", error);
    }

    this.logger.debug(
      { bucket: this.bucket.name, name, size: buffer.length },
      "Object uploaded",
    );
  }

  // ---- Read Operations ----

  async readBuffer(
    key: string,
  ): Promise<{ buffer: Buffer; metadata: ObjectMetadata }> {
    const name = this.objectName(key);

    try {
      // Pin the generation the metadata describes, so a concurrent overwrite
      // cannot pair new bytes with old metadata
      const [raw] = await this.bucket.file(name).getMetadata();
      const generation = asGeneration(raw.generation);
      const file = this.bucket.file(name, generation ? { generation } : {});
      const [buffer] = await file.download({ decompress: false });
      return { buffer, metadata: toObjectMetadata(raw, buffer.length) };
    } catch (error) {
      throw this.wrapError(key, "read", error);
    }
  }

  async head(key: string): Promise<ObjectMetadata | null> {
    const file = this.bucket.file(this.objectName(key));

    try {
      const [raw] = await file.getMetadata();
      return toObjectMetadata(raw, 0);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw this.wrapError(key, "head", error);
    }
  }

  async exists(key: string): Promise<boolean> {
    const file = this.bucket.file(this.objectName(key));

    try {
      const [found] = await file.exists();
      return found;
    } catch (error) {
      throw this.wrapError(key, "exists", error);
    }
  }

  // ---- Lifecycle ----

  async close(): Promise<void> {
    // The GCS client holds no connections that need closing
    this.logger.debug({ bucket: this.bucket.name }, "GcsStorage closed");
  }

  private wrapError(key: string, action: string, error: unknown): Error {
    if (isNotFound(error)) {
      return new StorageNotFoundError(key);
    }
    const cause = error instanceof Error ? error : undefined;
    return new StorageError(
      `Failed to ${action} ${key} in gs://${this.bucket.name}: ${cause?.message ?? String(error)}`,
      cause,
    );
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === 404
  );
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asDate(value: unknown): Date | undefined {
  const text = asString(value);
  return text ? new Date(text) : undefined;
}

function asGeneration(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  return asString(value);
}

/**
 * Convert GCS object metadata into the adapter-neutral shape
 */
function toObjectMetadata(
  raw: GcsObjectMetadata,
  fallbackSize: number,
): ObjectMetadata {
  const size = Number(raw.size ?? fallbackSize);

  return {
    contentType: asString(raw.contentType) ?? "application/octet-stream",
    size: Number.isFinite(size) ? size : fallbackSize,
    contentEncoding: asString(raw.contentEncoding),
    cacheControl: asString(raw.cacheControl),
    updatedAt: asDate(raw.updated) ?? new Date(0),
  };
}
