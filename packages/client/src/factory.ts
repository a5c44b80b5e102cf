/**
 * Client factory
 *
 * Wires a FlexClient from environment settings: Google Cloud Datastore for
 * records, the default bucket router for objects and a pino logger.
 */

import type { Datastore } from "@datastore-flex/datastore";
import { CloudDatastore } from "@datastore-flex/datastore/cloud";
import {
  createChildLogger,
  createLogger,
  type Logger,
} from "@datastore-flex/logger";
import {
  BucketRouter,
  type StorageFactory,
} from "@datastore-flex/storage/router";
import { FlexClient } from "./client.js";
import type { FlexConfigInput } from "./config.js";
import { loadFlexEnv } from "./env.js";

export interface CreateFlexClientOptions {
  /** Environment to read settings from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Property configuration applied after any saved one */
  config?: FlexConfigInput;
  /** Merge the configuration saved in the datastore (default: false) */
  loadStoredConfig?: boolean;
  /** Overrides the Cloud Datastore adapter */
  datastore?: Datastore;
  /** Bucket adapter factories by scheme, merged over the defaults */
  storageFactories?: Record<string, StorageFactory>;
  /** Overrides the logger built from LOG_LEVEL and NODE_ENV */
  logger?: Logger;
}

export async function createFlexClient(
  options: CreateFlexClientOptions = {},
): Promise<FlexClient> {
  const env = loadFlexEnv(options.env);
  const logger =
    options.logger ??
    createLogger({
      service: "datastore-flex",
      level: env.logLevel,
      environment: env.environment,
    });

  const datastore =
    options.datastore ??
    new CloudDatastore({
      projectId: env.projectId,
      namespace: env.namespace,
      logger: createChildLogger(logger, "datastore"),
    });

  const client = new FlexClient({
    datastore,
    buckets: new BucketRouter({
      factories: options.storageFactories,
      logger: createChildLogger(logger, "storage"),
    }),
    compression: env.compression,
    compressionLevel: env.compressionLevel,
    cacheControl: env.cacheControl,
    logger: createChildLogger(logger, "client"),
  });

  if (options.loadStoredConfig) {
    await client.loadConfig();
  }
  if (options.config) {
    client.addConfig(options.config);
  }
  return client;
}
