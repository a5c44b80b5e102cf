/**
 * @datastore-flex/datastore/core - Zero-dependency core types for the datastore port
 */

// ============================================================================
// Entity Types
// ============================================================================

/**
 * Key of a datastore entity
 *
 * A key is complete once it carries an `id` or a `name`. Numeric ids are kept
 * as strings so that 64-bit values survive.
 */
export interface EntityKey {
  kind: string;
  id?: string;
  name?: string;
  namespace?: string;
  parent?: EntityKey;
}

/**
 * A value a datastore property can hold
 */
export type EntityValue =
  | string
  | number
  | boolean
  | null
  | Date
  | Buffer
  | EntityValue[]
  | { [field: string]: EntityValue };

/**
 * Property values of an entity, by field name
 */
export type EntityData = Record<string, EntityValue>;

/**
 * A datastore record
 */
export interface Entity {
  key: EntityKey;
  data: EntityData;
  /** Properties to leave out of the datastore's indexes */
  excludeFromIndexes?: string[];
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface required by datastore adapters
 */
export interface DatastoreLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Base datastore configuration
 */
export interface DatastoreConfig {
  /** Namespace applied to keys that carry none */
  namespace?: string;

  /** Logger instance */
  logger?: DatastoreLogger;
}

// ============================================================================
// Datastore Interface
// ============================================================================

/**
 * Datastore port - entity get/put scoped to one project and namespace
 */
export interface Datastore {
  /** Namespace this client is scoped to */
  readonly namespace: string | undefined;

  /**
   * Fetch one entity
   *
   * @returns The entity, or null if no entity has this key
   */
  get(key: EntityKey): Promise<Entity | null>;

  /**
   * Fetch several entities; missing keys are left out of the result
   */
  getMulti(keys: EntityKey[]): Promise<Entity[]>;

  /**
   * Write one entity (insert or overwrite)
   *
   * An incomplete key is completed by the datastore and written back to
   * `entity.key`.
   */
  put(entity: Entity): Promise<void>;

  /**
   * Write several entities in one call
   */
  putMulti(entities: Entity[]): Promise<void>;

  /**
   * Reserve ids for an incomplete key
   *
   * @returns `count` complete keys sharing the kind and ancestors of `key`
   */
  allocateIds(key: EntityKey, count: number): Promise<EntityKey[]>;

  /**
   * Release client resources
   */
  close(): Promise<void>;
}
