/**
 * In-memory bucket adapter
 *
 * Backs `mem://` bucket URLs and stands in for real buckets in tests.
 */

import {
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

interface StoredObject {
  buffer: Buffer;
  metadata: ObjectMetadata;
}

const noopLogger: StorageLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class MemoryStorage implements Storage {
  private readonly objects = new Map<string, StoredObject>();
  private readonly logger: StorageLogger;

  constructor(config?: StorageConfig) {
    this.logger = config?.logger ?? noopLogger;
  }

  async writeBuffer(
    key: string,
    buffer: Buffer,
    options: WriteOptions,
  ): Promise<void> {
    checkKey(key);
    this.objects.set(key, {
      buffer: Buffer.from(buffer),
      metadata: {
        contentType: options.contentType,
        size: buffer.length,
        contentEncoding: options.contentEncoding,
        cacheControl: options.cacheControl,
        updatedAt: new Date(),
      },
    });
    this.logger.debug({ key, size: buffer.length }, "Object stored");
  }

  async readBuffer(
    key: string,
  ): Promise<{ buffer: Buffer; metadata: ObjectMetadata }> {
    const stored = this.lookup(key);
    if (!stored) throw new StorageNotFoundError(key);
    return { buffer: Buffer.from(stored.buffer), metadata: { ...stored.metadata } };
  }

  async head(key: string): Promise<ObjectMetadata | null> {
    const stored = this.lookup(key);
    return stored ? { ...stored.metadata } : null;
  }

  async exists(key: string): Promise<boolean> {
    return this.lookup(key) !== undefined;
  }

  async close(): Promise<void> {
    this.objects.clear();
  }

  /**
   * Drop every object, leaving the adapter open
   */
  clear(): void {
    this.objects.clear();
  }

  get size(): number {
    return this.objects.size;
  }

  private lookup(key: string): StoredObject | undefined {
    checkKey(key);
    return this.objects.get(key);
  }
}

function checkKey(key: string): void {
  if (!isValidKey(key)) {
    throw new StorageInvalidKeyError(key, "Invalid storage key format");
  }
}
