/**
 * Object path derivation
 *
 * path = bucket_path + "/" + entity[path_elements[0]] + "/" + ... [+ "/" + key id or name]
 */

import {
  type Entity,
  hasField,
  idOrName,
  keyToString,
} from "@datastore-flex/datastore";
import {
  isValidKey,
  isValidKeyComponent,
  joinBucketPath,
} from "@datastore-flex/storage";
import type { PropertyConfig } from "./config.js";
import { InvalidPathElementError, MissingFieldError } from "./errors.js";

/**
 * Where a property's payload lives
 */
export interface ObjectLocation {
  /** Bucket root the adapter is opened with, e.g. 'gs://b' */
  bucketPath: string;
  /** Key relative to the bucket root, e.g. 'g1/u1' */
  key: string;
  /** Full object URL, e.g. 'gs://b/g1/u1' */
  path: string;
}

/** Field name reported when the entity key has neither id nor name */
export const KEY_FIELD = "__key__";

/**
 * Read the path components of a property from its sibling fields
 *
 * Does no I/O; call it for every property before writing anything.
 *
 * @param includeKey - Whether to append the key id/name when the config asks for it
 * @throws MissingFieldError if a field is absent or null
 * @throws InvalidPathElementError if a field value cannot be a path component
 */
export function pathComponents(
  entity: Entity,
  property: string,
  config: PropertyConfig,
  includeKey = true,
): string[] {
  const components = config.pathElements.map((field) =>
    readComponent(entity, property, field),
  );

  if (config.appendKey && includeKey) {
    const id = idOrName(entity.key);
    if (id === undefined) {
      throw new MissingFieldError(property, KEY_FIELD, keyToString(entity.key));
    }
    components.push(checkComponent(entity, property, KEY_FIELD, id));
  }

  return components;
}

/**
 * Derive the object location of a property
 */
export function deriveLocation(
  entity: Entity,
  property: string,
  config: PropertyConfig,
): ObjectLocation {
  const key = pathComponents(entity, property, config).join("/");
  return {
    bucketPath: config.bucketPath,
    key,
    path: joinBucketPath(config.bucketPath, key),
  };
}

/**
 * Locate an object by the URL it was written to
 *
 * @returns null when the URL is not a key under the bucket root
 */
export function locationFromPath(
  bucketPath: string,
  path: string,
): ObjectLocation | null {
  const prefix = `${bucketPath}/`;
  if (!path.startsWith(prefix)) return null;

  const key = path.slice(prefix.length);
  return isValidKey(key) ? { bucketPath, key, path } : null;
}

function readComponent(
  entity: Entity,
  property: string,
  field: string,
): string {
  const value = hasField(entity.data, field) ? entity.data[field] : undefined;
  if (value === undefined || value === null) {
    throw new MissingFieldError(property, field, keyToString(entity.key));
  }

  if (typeof value !== "string" && typeof value !== "number") {
    throw new InvalidPathElementError(
      property,
      field,
      keyToString(entity.key),
      "only strings and numbers can be path elements",
    );
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new InvalidPathElementError(
      property,
      field,
      keyToString(entity.key),
      `${value} is not a finite number`,
    );
  }

  return checkComponent(entity, property, field, String(value));
}

function checkComponent(
  entity: Entity,
  property: string,
  field: string,
  component: string,
): string {
  if (!isValidKeyComponent(component)) {
    throw new InvalidPathElementError(
      property,
      field,
      keyToString(entity.key),
      `"${component}" is empty or contains a path separator or ".."`,
    );
  }
  return component;
}
