/**
 * FlexClient - datastore client that keeps configured properties in buckets
 *
 * On put, every configured property an entity carries is written to the
 * object at `bucket_path/<path element values>` and replaced in the record by
 * a BucketReference. On get, references are resolved back to the payload.
 *
 * @example
 * ```typescript
 * const client = new FlexClient({
 *   datastore: new MemoryDatastore(),
 *   buckets: new BucketRouter(),
 *   config: { v1: { bucket_path: "mem://b", path_elements: ["group_id", "user_id"] } },
 * });
 *
 * await client.put({ key: { kind: "Profile", name: "u1" }, data: { group_id: "g1", user_id: "u1", v1: "hello" } });
 * ```
 */

import {
  type Datastore,
  type Entity,
  type EntityKey,
  type EntityValue,
  hasField,
  isCompleteKey,
  keyToString,
  setField,
  withNamespace,
} from "@datastore-flex/datastore";
import type { Storage } from "@datastore-flex/storage";
import type { BucketRouter } from "@datastore-flex/storage/router";
import { z } from "zod";
import {
  ConfigRegistry,
  type FlexConfigInput,
  type PropertyConfig,
} from "./config.js";
import { DEFAULT_CACHE_CONTROL, DEFAULT_COMPRESSION_LEVEL } from "./env.js";
import {
  BucketIOError,
  ConfigurationError,
  DatastoreIOError,
  toError,
} from "./errors.js";
import {
  type BucketReference,
  compress,
  decodeValue,
  decompress,
  encodeValue,
  isBucketReference,
  toReference,
} from "./payload.js";
import {
  deriveLocation,
  locationFromPath,
  type ObjectLocation,
  pathComponents,
} from "./paths.js";
import {
  type Compression,
  type FlexLogger,
  noopLogger,
  type PutOptions,
} from "./types.js";

/** Name of the entity the configuration is saved under */
export const CONFIG_ENTITY_NAME = "column";

/** Property of the config entity holding the configuration JSON */
export const CONFIG_VALUE_FIELD = "value";

const putOptionsSchema = z
  .object({
    compression: z.enum(["gzip", "none"]).optional(),
    compressionLevel: z.number().int().min(0).max(9).optional(),
  })
  .strict();

export interface FlexClientOptions extends PutOptions {
  /** Datastore the records are written to */
  datastore: Datastore;
  /** Resolves bucket roots to storage adapters */
  buckets: BucketRouter;
  /** Initial property configuration */
  config?: FlexConfigInput;
  /** Cache-Control header for written objects */
  cacheControl?: string;
  logger?: FlexLogger;
}

/**
 * A redirected property of a read entity, with the object to read
 */
interface PlannedRead {
  property: string;
  config: PropertyConfig;
  reference: BucketReference;
  location: ObjectLocation;
}

/**
 * A configured property an entity carries, ready to be written
 */
interface PlannedWrite {
  entity: Entity;
  property: string;
  config: PropertyConfig;
  value: EntityValue;
  storage: Storage;
}

export class FlexClient {
  private readonly datastore: Datastore;
  private readonly buckets: BucketRouter;
  private readonly logger: FlexLogger;
  private readonly compression: Compression;
  private readonly compressionLevel: number;
  private readonly cacheControl: string;
  private registry: ConfigRegistry;

  constructor(options: FlexClientOptions) {
    const defaults = parsePutOptions({
      compression: options.compression,
      compressionLevel: options.compressionLevel,
    });

    this.datastore = options.datastore;
    this.buckets = options.buckets;
    this.logger = options.logger ?? noopLogger;
    this.compression = defaults.compression ?? "gzip";
    this.compressionLevel =
      defaults.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
    this.cacheControl = options.cacheControl ?? DEFAULT_CACHE_CONTROL;
    this.registry = options.config
      ? ConfigRegistry.from(options.config)
      : ConfigRegistry.empty();

    this.logger.debug(
      {
        namespace: this.datastore.namespace,
        properties: this.registry.size,
        compression: this.compression,
      },
      "FlexClient initialized",
    );
  }

  /**
   * The current property configuration
   */
  get config(): ConfigRegistry {
    return this.registry;
  }

  // ---- Configuration ----

  /**
   * Validate and merge a configuration; later calls win per property
   *
   * Performs no I/O. Operations already in flight keep the configuration
   * they started with.
   *
   * @throws ConfigurationError if the configuration is malformed
   */
  addConfig(config: FlexConfigInput): ConfigRegistry {
    this.registry = this.registry.merge(config);
    this.logger.debug(
      { properties: Object.keys(config) },
      "Property configuration added",
    );
    return this.registry;
  }

  /**
   * Persist the current configuration as a datastore entity
   *
   * @returns The entity written
   * @throws DatastoreIOError if the datastore write fails
   */
  async saveConfig(): Promise<Entity> {
    const entity: Entity = {
      key: this.configKey(),
      data: {
        [CONFIG_VALUE_FIELD]: JSON.stringify(this.registry.toJSON()),
      },
      excludeFromIndexes: [CONFIG_VALUE_FIELD],
    };

    try {
      await this.datastore.put(entity);
    } catch (error) {
      throw new DatastoreIOError("put", toError(error));
    }

    this.logger.info(
      { key: keyToString(entity.key), properties: this.registry.size },
      "Property configuration saved",
    );
    return entity;
  }

  /**
   * Read the saved configuration and merge it into the current one
   *
   * A missing config entity leaves the configuration unchanged.
   *
   * @throws DatastoreIOError if the datastore read fails
   * @throws ConfigurationError if the saved configuration is malformed
   */
  async loadConfig(): Promise<ConfigRegistry> {
    const key = this.configKey();
    let entity: Entity | null;
    try {
      entity = await this.datastore.get(key);
    } catch (error) {
      throw new DatastoreIOError("get", toError(error));
    }

    if (!entity) {
      this.logger.debug(
        { key: keyToString(withNamespace(key, this.datastore.namespace)) },
        "No saved property configuration",
      );
      return this.registry;
    }

    const raw = entity.data[CONFIG_VALUE_FIELD];
    if (typeof raw !== "string") {
      throw new ConfigurationError("Invalid saved configuration", [
        `${CONFIG_VALUE_FIELD}: expected a JSON string`,
      ]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError("Invalid saved configuration", [
        `${CONFIG_VALUE_FIELD}: ${toError(error).message}`,
      ]);
    }

    this.registry = this.registry.merge(parsed);
    this.logger.info(
      { key: keyToString(entity.key), properties: this.registry.size },
      "Property configuration loaded",
    );
    return this.registry;
  }

  // ---- Write Operations ----

  /**
   * Write an entity, redirecting configured properties to their buckets
   *
   * The entity is updated in place: redirected properties hold a
   * BucketReference afterwards, and an incomplete key is completed.
   *
   * @throws MissingFieldError if a path field is absent (before any I/O)
   * @throws InvalidPathElementError if a path field cannot be used (before any I/O)
   * @throws BucketIOError if a bucket write fails
   * @throws DatastoreIOError if the datastore write fails
   */
  async put(entity: Entity, options?: PutOptions): Promise<void> {
    await this.putMulti([entity], options);
  }

  /**
   * Write several entities, redirecting configured properties
   *
   * Paths are derived for every entity before the first write; objects are
   * then written one after another and the entities are handed to the
   * datastore in one batch.
   */
  async putMulti(entities: Entity[], options?: PutOptions): Promise<void> {
    const registry = this.registry;
    const { compression, compressionLevel } = this.resolvePutOptions(options);

    const plan = this.planWrites(entities, registry);
    await this.allocateKeys(plan);

    const references: [PlannedWrite, BucketReference][] = [];
    for (const write of plan) {
      const reference = await this.writeObject(
        write,
        compression,
        compressionLevel,
      );
      references.push([write, reference]);
    }

    for (const [{ entity, property }, reference] of references) {
      setField(entity.data, property, reference);
    }

    try {
      await this.datastore.putMulti(entities);
    } catch (error) {
      throw new DatastoreIOError("put", toError(error));
    }
  }

  // ---- Read Operations ----

  /**
   * Read an entity, resolving redirected properties from their buckets
   *
   * @returns The entity, or null if it does not exist
   * @throws MissingFieldError if a path field of a redirected property is absent
   * @throws BucketIOError if a bucket read fails
   * @throws DatastoreIOError if the datastore read fails
   */
  async get(key: EntityKey): Promise<Entity | null> {
    const registry = this.registry;
    let entity: Entity | null;
    try {
      entity = await this.datastore.get(key);
    } catch (error) {
      throw new DatastoreIOError("get", toError(error));
    }

    if (!entity) return null;
    await this.resolveEntity(entity, registry);
    return entity;
  }

  /**
   * Read several entities; missing keys are left out of the result
   */
  async getMulti(keys: EntityKey[]): Promise<Entity[]> {
    const registry = this.registry;
    let entities: Entity[];
    try {
      entities = await this.datastore.getMulti(keys);
    } catch (error) {
      throw new DatastoreIOError("get", toError(error));
    }

    for (const entity of entities) {
      await this.resolveEntity(entity, registry);
    }
    return entities;
  }

  // ---- Lifecycle ----

  /**
   * Close the datastore and every bucket adapter opened so far
   */
  async close(): Promise<void> {
    await this.buckets.close();
    await this.datastore.close();
    this.logger.debug({}, "FlexClient closed");
  }

  // ---- Internals ----

  private resolvePutOptions(options?: PutOptions): {
    compression: Compression;
    compressionLevel: number;
  } {
    const parsed = parsePutOptions(options ?? {});
    return {
      compression: parsed.compression ?? this.compression,
      compressionLevel: parsed.compressionLevel ?? this.compressionLevel,
    };
  }

  /**
   * Find every configured property to redirect and check its path fields
   *
   * No I/O happens here, so a bad entity fails the whole batch untouched.
   */
  private planWrites(
    entities: Entity[],
    registry: ConfigRegistry,
  ): PlannedWrite[] {
    const plan: PlannedWrite[] = [];
    for (const entity of entities) {
      for (const [property, config] of registry.properties()) {
        if (!hasField(entity.data, property)) continue;

        const value = entity.data[property];
        if (value === undefined) continue;
        if (
          isBucketReference(value) &&
          this.isStoredReference(entity, property, config, value)
        ) {
          continue;
        }

        pathComponents(entity, property, config, isCompleteKey(entity.key));
        plan.push({
          entity,
          property,
          config,
          value,
          storage: this.openBucket(config.bucketPath, "write"),
        });
      }
    }
    return plan;
  }

  /**
   * Allocate ids for entities whose object paths end in their key
   */
  private async allocateKeys(plan: PlannedWrite[]): Promise<void> {
    const groups = new Map<string, Entity[]>();
    for (const { entity, config } of plan) {
      if (!config.appendKey || isCompleteKey(entity.key)) continue;

      const group = keyToString(
        withNamespace(entity.key, this.datastore.namespace),
      );
      const members = groups.get(group) ?? [];
      if (!members.includes(entity)) members.push(entity);
      groups.set(group, members);
    }

    for (const members of groups.values()) {
      const [first] = members;
      if (!first) continue;

      let keys: EntityKey[];
      try {
        keys = await this.datastore.allocateIds(first.key, members.length);
      } catch (error) {
        throw new DatastoreIOError("allocateIds", toError(error));
      }

      members.forEach((entity, index) => {
        const key = keys[index];
        if (!key) {
          throw new DatastoreIOError(
            "allocateIds",
            new Error(
              `Expected ${members.length} ids, received ${keys.length}`,
            ),
          );
        }
        entity.key = key;
      });
      this.logger.debug(
        { kind: first.key.kind, count: members.length },
        "Entity ids allocated",
      );
    }
  }

  private async writeObject(
    write: PlannedWrite,
    compression: Compression,
    compressionLevel: number,
  ): Promise<BucketReference> {
    const { entity, property, config, value, storage } = write;
    const location = deriveLocation(entity, property, config);
    const payload = encodeValue(value);

    try {
      const stored = await compress(payload.body, compression, compressionLevel);
      await storage.writeBuffer(location.key, stored.body, {
        contentType: payload.contentType,
        contentEncoding: stored.contentEncoding,
        cacheControl: this.cacheControl,
      });
    } catch (error) {
      throw new BucketIOError(location.path, "write", toError(error));
    }

    this.logger.debug(
      {
        property,
        path: location.path,
        codec: payload.codec,
        size: payload.body.length,
      },
      "Property written to bucket",
    );
    return toReference(location.path, payload.codec);
  }

  /**
   * Whether a reference-shaped value already points at this property's object
   *
   * Any other value of that shape is user data and gets redirected like the
   * rest. When a path field is itself still a reference, the path cannot be
   * derived and a reference under the bucket root counts as stored.
   */
  private isStoredReference(
    entity: Entity,
    property: string,
    config: PropertyConfig,
    reference: BucketReference,
  ): boolean {
    const dependsOnReference = config.pathElements.some((field) =>
      isBucketReference(entity.data[field]),
    );
    if (dependsOnReference) {
      return locationFromPath(config.bucketPath, reference.flexRef) !== null;
    }
    if (config.appendKey && !isCompleteKey(entity.key)) return false;

    return deriveLocation(entity, property, config).path === reference.flexRef;
  }

  /**
   * Replace every reference of an entity with its payload
   *
   * A property whose path fields include another redirected property is
   * resolved after it, so paths are derived from the values they were
   * written with. Properties whose path fields form a cycle are read at the
   * URL their reference holds.
   */
  private async resolveEntity(
    entity: Entity,
    registry: ConfigRegistry,
  ): Promise<void> {
    const pending = new Map<
      string,
      { config: PropertyConfig; reference: BucketReference }
    >();
    for (const [property, config] of registry.properties()) {
      if (!hasField(entity.data, property)) continue;

      const reference = entity.data[property];
      if (isBucketReference(reference)) {
        pending.set(property, { config, reference });
      }
    }

    while (pending.size > 0) {
      const ready = [...pending].filter(
        ([, { config }]) =>
          !config.pathElements.some((field) => pending.has(field)),
      );

      const reads: PlannedRead[] =
        ready.length > 0
          ? ready.map(([property, { config, reference }]) => ({
              property,
              config,
              reference,
              location: this.derivedLocation(
                entity,
                property,
                config,
                reference,
              ),
            }))
          : [...pending].map(([property, { config, reference }]) => ({
              property,
              config,
              reference,
              location: this.referencedLocation(
                entity,
                property,
                config,
                reference,
              ),
            }));

      for (const read of reads) {
        await this.readObject(entity, read);
        pending.delete(read.property);
      }
    }
  }

  private derivedLocation(
    entity: Entity,
    property: string,
    config: PropertyConfig,
    reference: BucketReference,
  ): ObjectLocation {
    const location = deriveLocation(entity, property, config);
    if (location.path !== reference.flexRef) {
      this.logger.warn(
        {
          key: keyToString(entity.key),
          property,
          stored: reference.flexRef,
          derived: location.path,
        },
        "Stored reference differs from derived path, reading derived path",
      );
    }
    return location;
  }

  private referencedLocation(
    entity: Entity,
    property: string,
    config: PropertyConfig,
    reference: BucketReference,
  ): ObjectLocation {
    const location = locationFromPath(config.bucketPath, reference.flexRef);
    if (!location) {
      throw new BucketIOError(
        reference.flexRef,
        "read",
        new Error(`Reference is not under ${config.bucketPath}`),
      );
    }
    this.logger.debug(
      { key: keyToString(entity.key), property, path: location.path },
      "Path fields form a cycle, reading stored reference",
    );
    return location;
  }

  private async readObject(entity: Entity, read: PlannedRead): Promise<void> {
    const { property, config, reference, location } = read;
    const storage = this.openBucket(config.bucketPath, "read");
    try {
      const { buffer, metadata } = await storage.readBuffer(location.key);
      const body = await decompress(buffer, metadata.contentEncoding);
      const value = decodeValue(property, reference.codec, body);
      setField(entity.data, property, value);
    } catch (error) {
      throw new BucketIOError(location.path, "read", toError(error));
    }

    this.logger.debug(
      { property, path: location.path, codec: reference.codec },
      "Property read from bucket",
    );
  }

  private openBucket(bucketPath: string, operation: "read" | "write"): Storage {
    try {
      return this.buckets.open(bucketPath);
    } catch (error) {
      throw new BucketIOError(bucketPath, operation, toError(error));
    }
  }

  private configKey(): EntityKey {
    return {
      kind: `${this.datastore.namespace ?? "default"}_config`,
      name: CONFIG_ENTITY_NAME,
    };
  }
}

function parsePutOptions(options: PutOptions): PutOptions {
  const result = putOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid put options",
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
