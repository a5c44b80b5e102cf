/**
 * Shared client types
 */

import type { DatastoreLogger } from "@datastore-flex/datastore";
import type { StorageLogger } from "@datastore-flex/storage";

/**
 * Minimal logger interface accepted by the client
 *
 * Any pino logger fits; it is handed on to the storage and datastore
 * adapters the factory creates.
 */
export interface FlexLogger extends StorageLogger, DatastoreLogger {}

export const noopLogger: FlexLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type Compression = "gzip" | "none";

/**
 * Options for put and putMulti
 */
export interface PutOptions {
  /** Compression applied to written objects (default: the client's, else gzip) */
  compression?: Compression;
  /** gzip level, 0-9 (default: the client's, else 6) */
  compressionLevel?: number;
}
