/**
 * Google Cloud Datastore adapter
 *
 * Wraps @google-cloud/datastore behind the Datastore port. Authentication,
 * transport and retries stay with the client library.
 */

import {
  Datastore as GoogleDatastore,
  type DatastoreOptions,
} from "@google-cloud/datastore";
import { DatastoreError } from "../../core/errors.js";
import { keyPath, keyToString, withNamespace } from "../../core/keys.js";
import { toEntityData } from "../../core/values.js";
import type {
  Datastore,
  DatastoreConfig,
  DatastoreLogger,
  Entity,
  EntityKey,
} from "../../core/types.js";

type CloudKey = ReturnType<GoogleDatastore["key"]>;

/**
 * Cloud datastore configuration
 */
export interface CloudDatastoreConfig extends DatastoreConfig {
  /** Google Cloud project id (default: from the environment) */
  projectId?: string;

  /** Extra client options (credentials, keyFilename, apiEndpoint, ...) */
  clientOptions?: DatastoreOptions;

  /** Pre-built client; takes precedence over projectId and clientOptions */
  client?: GoogleDatastore;
}

const noopLogger: DatastoreLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Google Cloud Datastore implementation
 */
export class CloudDatastore implements Datastore {
  readonly namespace: string | undefined;
  private readonly client: GoogleDatastore;
  private readonly logger: DatastoreLogger;

  constructor(config?: CloudDatastoreConfig) {
    this.namespace = config?.namespace;
    this.client =
      config?.client ??
      new GoogleDatastore({
        ...config?.clientOptions,
        projectId: config?.projectId ?? config?.clientOptions?.projectId,
        namespace: config?.namespace,
      });
    this.logger = config?.logger ?? noopLogger;

    this.logger.debug(
      { projectId: config?.projectId, namespace: this.namespace },
      "CloudDatastore initialized",
    );
  }

  async get(key: EntityKey): Promise<Entity | null> {
    const found = await this.getMulti([key]);
    return found[0] ?? null;
  }

  async getMulti(keys: EntityKey[]): Promise<Entity[]> {
    if (keys.length === 0) return [];

    let response: unknown;
    try {
      [response] = await this.client.get(keys.map((key) => this.toCloudKey(key)));
    } catch (error) {
      throw this.wrapError("get", keys, error);
    }

    const rows = Array.isArray(response) ? response : [response];
    const entities: Entity[] = [];
    for (const row of rows) {
      if (row === undefined || row === null) continue;
      entities.push(fromCloudEntity(row));
    }
    return entities;
  }

  async put(entity: Entity): Promise<void> {
    await this.putMulti([entity]);
  }

  async putMulti(entities: Entity[]): Promise<void> {
    if (entities.length === 0) return;

    const rows = entities.map((entity) => ({
      key: this.toCloudKey(entity.key),
      data: entity.data,
      excludeFromIndexes: entity.excludeFromIndexes,
    }));

    try {
      await this.client.save(rows);
    } catch (error) {
      throw this.wrapError(
        "save",
        entities.map((entity) => entity.key),
        error,
      );
    }

    // The client completes incomplete keys in place
    rows.forEach((row, index) => {
      const entity = entities[index];
      if (entity) entity.key = fromCloudKey(row.key);
    });

    this.logger.debug({ count: entities.length }, "Entities saved");
  }

  async allocateIds(key: EntityKey, count: number): Promise<EntityKey[]> {
    try {
      const [keys] = await this.client.allocateIds(this.toCloudKey(key), count);
      return keys.map(fromCloudKey);
    } catch (error) {
      throw this.wrapError("allocate ids for", [key], error);
    }
  }

  async close(): Promise<void> {
    // The client library manages its own channels
    this.logger.debug({}, "CloudDatastore closed");
  }

  /**
   * Build a client-library key, ancestors included
   */
  private toCloudKey(key: EntityKey): CloudKey {
    const resolved = withNamespace(key, this.namespace);
    const path: Array<string | ReturnType<GoogleDatastore["int"]>> = [];
    for (const element of keyPath(resolved)) {
      path.push(element.kind);
      if (element.name !== undefined) {
        path.push(element.name);
      } else if (element.id !== undefined) {
        path.push(this.client.int(element.id));
      }
    }
    return this.client.key({ namespace: resolved.namespace, path });
  }

  private wrapError(action: string, keys: EntityKey[], error: unknown): Error {
    const cause = error instanceof Error ? error : undefined;
    const target = keys
      .map((key) => keyToString(withNamespace(key, this.namespace)))
      .join(", ");
    return new DatastoreError(
      `Failed to ${action} ${target}: ${cause?.message ?? String(error)}`,
      cause,
    );
  }
}

function readString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  return undefined;
}

/**
 * Read a client-library key into an EntityKey
 */
export function fromCloudKey(raw: unknown): EntityKey {
  if (typeof raw !== "object" || raw === null || !("kind" in raw)) {
    throw new DatastoreError("Datastore returned an entity without a key");
  }
  const kind = readString(raw.kind);
  if (!kind) {
    throw new DatastoreError("Datastore returned a key without a kind");
  }

  const key: EntityKey = { kind };
  const id = "id" in raw ? readString(raw.id) : undefined;
  const name = "name" in raw ? readString(raw.name) : undefined;
  const namespace = "namespace" in raw ? readString(raw.namespace) : undefined;
  if (id !== undefined) key.id = id;
  if (name !== undefined) key.name = name;
  if (namespace) key.namespace = namespace;
  if ("parent" in raw && raw.parent) key.parent = fromCloudKey(raw.parent);
  return key;
}

/**
 * Read an entity returned by the client library
 */
export function fromCloudEntity(raw: unknown): Entity {
  if (typeof raw !== "object" || raw === null || !(GoogleDatastore.KEY in raw)) {
    throw new DatastoreError("Datastore returned an entity without a key");
  }
  return {
    key: fromCloudKey(raw[GoogleDatastore.KEY]),
    data: toEntityData(raw),
  };
}
