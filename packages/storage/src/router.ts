/**
 * Bucket router
 *
 * Resolves a bucket root URL to a storage adapter by its scheme and keeps one
 * adapter per root, so every property configured against `gs://b` shares a
 * client.
 */

import { fileURLToPath } from "node:url";
import { GcsStorage } from "./adapters/gcs/index.js";
import { LocalStorage } from "./adapters/local/index.js";
import { MemoryStorage } from "./adapters/memory/index.js";
import {
  StorageInvalidKeyError,
  StorageUnsupportedSchemeError,
} from "./core/errors.js";
import type { Storage, StorageConfig, StorageLogger } from "./core/types.js";
import {
  type BucketUrl,
  normalizeBucketRoot,
  parseBucketUrl,
  splitBucketLocation,
} from "./core/urls.js";

/**
 * A parsed bucket root handed to adapter factories
 */
export interface BucketRoot extends BucketUrl {
  /** Normalized root URL, e.g. 'gs://my-bucket/blobs' */
  url: string;
}

export type StorageFactory = (
  root: BucketRoot,
  logger: StorageLogger | undefined,
) => Storage;

export interface BucketRouterConfig extends StorageConfig {
  /**
   * Adapter factories by scheme. Merged over the defaults
   * (`gs`, `file`, `mem`), so a test can route `gs` to memory.
   */
  factories?: Record<string, StorageFactory>;
}

export const defaultStorageFactories: Readonly<Record<string, StorageFactory>> =
  {
    gs: (root, logger) => {
      const { bucket, prefix } = splitBucketLocation(root.location);
      return new GcsStorage({ bucket, prefix, logger });
    },
    file: (root, logger) =>
      new LocalStorage({ baseDir: fileURLToPath(root.url), logger }),
    mem: (_root, logger) => new MemoryStorage({ logger }),
  };

export class BucketRouter {
  private readonly factories: Record<string, StorageFactory>;
  private readonly adapters: Map<string, Storage> = new Map();
  private readonly logger: StorageLogger | undefined;

  constructor(config?: BucketRouterConfig) {
    this.factories = { ...defaultStorageFactories, ...config?.factories };
    this.logger = config?.logger;
  }

  /**
   * Get the adapter for a bucket root URL, creating it on first use
   *
   * @param rootUrl - e.g. 'gs://my-bucket' or 'gs://my-bucket/blobs'
   * @throws StorageInvalidKeyError if the URL cannot be parsed
   * @throws StorageUnsupportedSchemeError if no factory handles the scheme
   */
  open(rootUrl: string): Storage {
    const parsed = parseBucketUrl(rootUrl);
    if (!parsed) {
      throw new StorageInvalidKeyError(rootUrl, `Invalid bucket URL: ${rootUrl}`);
    }

    const url = normalizeBucketRoot(rootUrl);
    const cached = this.adapters.get(url);
    if (cached) return cached;

    const factory = this.factories[parsed.scheme];
    if (!factory) {
      throw new StorageUnsupportedSchemeError(rootUrl, parsed.scheme);
    }

    const adapter = factory({ ...parsed, url }, this.logger);
    this.adapters.set(url, adapter);
    this.logger?.debug({ url, scheme: parsed.scheme }, "Bucket adapter opened");
    return adapter;
  }

  /**
   * Schemes this router can open
   */
  get schemes(): string[] {
    return Object.keys(this.factories).sort();
  }

  /**
   * Close every adapter opened so far
   */
  async close(): Promise<void> {
    const adapters = [...this.adapters.values()];
    this.adapters.clear();
    for (const adapter of adapters) {
      await adapter.close();
    }
  }
}
