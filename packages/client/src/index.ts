/**
 * @datastore-flex/client - Datastore client that keeps configured entity
 * properties in bucket objects
 *
 * ## Usage
 *
 * ```typescript
 * import { createFlexClient } from '@datastore-flex/client';
 *
 * const client = await createFlexClient({
 *   config: { v1: { bucket_path: 'gs://b', path_elements: ['group_id', 'user_id'] } },
 * });
 * ```
 */

export { FlexClient, CONFIG_ENTITY_NAME, CONFIG_VALUE_FIELD } from "./client.js";
export type { FlexClientOptions } from "./client.js";

export { createFlexClient } from "./factory.js";
export type { CreateFlexClientOptions } from "./factory.js";

export {
  ConfigRegistry,
  flexConfigSchema,
  parseFlexConfig,
  propertyConfigSchema,
} from "./config.js";
export type { FlexConfigInput, PropertyConfig } from "./config.js";

export {
  DEFAULT_CACHE_CONTROL,
  DEFAULT_COMPRESSION_LEVEL,
  loadFlexEnv,
} from "./env.js";
export type { FlexEnv } from "./env.js";

export {
  BucketIOError,
  ConfigurationError,
  DatastoreIOError,
  FlexError,
  InvalidPathElementError,
  MissingFieldError,
} from "./errors.js";

export {
  bucketReferenceSchema,
  CODECS,
  isBucketReference,
} from "./payload.js";
export type { BucketReference, Codec } from "./payload.js";

export { deriveLocation, KEY_FIELD, pathComponents } from "./paths.js";
export type { ObjectLocation } from "./paths.js";

export { noopLogger } from "./types.js";
export type { Compression, FlexLogger, PutOptions } from "./types.js";
