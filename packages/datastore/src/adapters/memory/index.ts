/**
 * In-memory datastore adapter for testing
 *
 * Entities are deep-copied on the way in and out, so callers never share
 * state with the store.
 */

import { DatastoreIncompleteKeyError } from "../../core/errors.js";
import {
  cloneKey,
  isCompleteKey,
  keyToString,
  withNamespace,
} from "../../core/keys.js";
import { cloneData } from "../../core/values.js";
import type {
  Datastore,
  DatastoreConfig,
  DatastoreLogger,
  Entity,
  EntityKey,
} from "../../core/types.js";

const noopLogger: DatastoreLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * In-memory datastore implementation
 */
export class MemoryDatastore implements Datastore {
  readonly namespace: string | undefined;
  private readonly entities: Map<string, Entity> = new Map();
  private readonly logger: DatastoreLogger;
  private nextId = 1;

  constructor(config?: DatastoreConfig) {
    this.namespace = config?.namespace;
    this.logger = config?.logger ?? noopLogger;
    this.logger.debug({ namespace: this.namespace }, "MemoryDatastore initialized");
  }

  async get(key: EntityKey): Promise<Entity | null> {
    const resolved = withNamespace(key, this.namespace);
    if (!isCompleteKey(resolved)) {
      throw new DatastoreIncompleteKeyError(keyToString(resolved));
    }

    const stored = this.entities.get(keyToString(resolved));
    return stored ? copyEntity(stored) : null;
  }

  async getMulti(keys: EntityKey[]): Promise<Entity[]> {
    const found: Entity[] = [];
    for (const key of keys) {
      const entity = await this.get(key);
      if (entity) found.push(entity);
    }
    return found;
  }

  async put(entity: Entity): Promise<void> {
    let key = withNamespace(entity.key, this.namespace);
    if (!isCompleteKey(key)) {
      key = { ...key, id: this.allocateId() };
    }
    entity.key = key;

    this.entities.set(keyToString(key), copyEntity(entity));
    this.logger.debug({ key: keyToString(key) }, "Entity stored");
  }

  async putMulti(entities: Entity[]): Promise<void> {
    for (const entity of entities) {
      await this.put(entity);
    }
  }

  async allocateIds(key: EntityKey, count: number): Promise<EntityKey[]> {
    const base = withNamespace(key, this.namespace);
    const keys: EntityKey[] = [];
    for (let i = 0; i < count; i++) {
      keys.push({ ...base, name: undefined, id: this.allocateId() });
    }
    return keys;
  }

  async close(): Promise<void> {
    this.entities.clear();
    this.logger.debug({}, "MemoryDatastore closed");
  }

  // ---- Test Utilities ----

  /**
   * Number of stored entities
   */
  get size(): number {
    return this.entities.size;
  }

  private allocateId(): string {
    return String(this.nextId++);
  }
}

function copyEntity(entity: Entity): Entity {
  return {
    key: cloneKey(entity.key),
    data: cloneData(entity.data),
    excludeFromIndexes: entity.excludeFromIndexes
      ? [...entity.excludeFromIndexes]
      : undefined,
  };
}
