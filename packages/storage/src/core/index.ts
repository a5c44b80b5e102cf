/**
 * @datastore-flex/storage/core - Zero-dependency core types
 *
 * This module exports only types and pure functions with no external dependencies.
 * It can be imported by any module without bringing in adapter-specific code.
 */

// Types
export type {
  ObjectMetadata,
  WriteOptions,
  StorageLogger,
  StorageConfig,
  Storage,
} from "./types.js";

// Errors
export {
  StorageError,
  StorageNotFoundError,
  StorageInvalidKeyError,
  StorageUnsupportedSchemeError,
} from "./errors.js";

// URL utilities
export type { BucketUrl, BucketLocation } from "./urls.js";
export {
  isBucketUrl,
  parseBucketUrl,
  splitBucketLocation,
  normalizeBucketRoot,
  joinBucketPath,
  isValidKey,
  isValidKeyComponent,
} from "./urls.js";
