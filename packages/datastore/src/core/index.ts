/**
 * @datastore-flex/datastore/core - Zero-dependency core types
 */

// Types
export type {
  EntityKey,
  EntityValue,
  EntityData,
  Entity,
  DatastoreLogger,
  DatastoreConfig,
  Datastore,
} from "./types.js";

// Errors
export {
  DatastoreError,
  DatastoreIncompleteKeyError,
  DatastoreValueError,
} from "./errors.js";

// Key utilities
export {
  isCompleteKey,
  idOrName,
  withNamespace,
  keyPath,
  keyToString,
  cloneKey,
} from "./keys.js";

// Value utilities
export {
  cloneValue,
  cloneData,
  hasField,
  setField,
  toEntityValue,
  toEntityData,
} from "./values.js";
