/**
 * Property value helpers
 */

import { DatastoreValueError } from "./errors.js";
import type { EntityData, EntityValue } from "./types.js";

/**
 * Deep copy a property value
 */
export function cloneValue(value: EntityValue): EntityValue {
  if (Buffer.isBuffer(value)) return Buffer.from(value);
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return value.map(cloneValue);
  if (value !== null && typeof value === "object") {
    return cloneData(value);
  }
  return value;
}

/**
 * Deep copy entity data
 */
export function cloneData(data: EntityData): EntityData {
  return Object.fromEntries(
    Object.entries(data).map(([field, value]) => [field, cloneValue(value)]),
  );
}

/**
 * Check whether an entity carries a field (own property, any value)
 */
export function hasField(data: EntityData, field: string): boolean {
  return Object.hasOwn(data, field);
}

/**
 * Set a field as an own property, `__proto__` included
 */
export function setField(
  data: EntityData,
  field: string,
  value: EntityValue,
): void {
  Object.defineProperty(data, field, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Narrow a value read from a client library to an EntityValue
 *
 * Unknown object types (geo points, wrapped numbers, keys) are read as
 * plain objects of their enumerable fields.
 *
 * @param field - Property name, for error messages
 * @throws DatastoreValueError for values with no datastore representation
 */
export function toEntityValue(field: string, raw: unknown): EntityValue {
  if (
    raw === null ||
    typeof raw === "string" ||
    typeof raw === "number" ||
    typeof raw === "boolean"
  ) {
    return raw;
  }
  if (Buffer.isBuffer(raw)) return raw;
  if (raw instanceof Uint8Array) return Buffer.from(raw);
  if (raw instanceof Date) return raw;
  if (Array.isArray(raw)) {
    return raw.map((item, index) => toEntityValue(`${field}[${index}]`, item));
  }
  if (typeof raw === "object") {
    return toEntityData(raw, `${field}.`);
  }
  throw new DatastoreValueError(field);
}

/**
 * Narrow an object read from a client library to EntityData
 *
 * Only own enumerable string keys are read; symbol keys are skipped.
 */
export function toEntityData(raw: object, fieldPrefix = ""): EntityData {
  return Object.fromEntries(
    Object.entries(raw)
      .filter(([, value]) => value !== undefined)
      .map(([field, value]) => [
        field,
        toEntityValue(fieldPrefix + field, value),
      ]),
  );
}
