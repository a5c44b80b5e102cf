/**
 * @datastore-flex/storage - Bucket storage abstraction with multiple backends
 *
 * Provides a unified interface for object storage with support for Google
 * Cloud Storage, the local filesystem and in-memory buckets.
 *
 * ## Usage
 *
 * Import the core types and URL utilities from the main export:
 * ```typescript
 * import { joinBucketPath, parseBucketUrl } from '@datastore-flex/storage';
 * import type { Storage, ObjectMetadata } from '@datastore-flex/storage';
 * ```
 *
 * Import adapters, or the scheme router, from their specific paths:
 * ```typescript
 * import { GcsStorage } from '@datastore-flex/storage/gcs';
 * import { MemoryStorage } from '@datastore-flex/storage/memory';
 * import { BucketRouter } from '@datastore-flex/storage/router';
 * ```
 */

// Re-export everything from core
export * from "./core/index.js";
