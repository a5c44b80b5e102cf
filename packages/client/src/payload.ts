/**
 * Payload encoding
 *
 * A redirected value is written as the bytes of one of four codecs and
 * replaced in the record by a reference naming the object and the codec.
 */

import { promisify } from "node:util";
import { gunzip as gunzipCallback, gzip as gzipCallback } from "node:zlib";
import type { EntityValue } from "@datastore-flex/datastore";
import { z } from "zod";
import type { Compression } from "./types.js";

const gzipAsync = promisify(gzipCallback);
const gunzipAsync = promisify(gunzipCallback);

export const CODECS = ["text", "bytes", "json", "date"] as const;

export type Codec = (typeof CODECS)[number];

export const bucketReferenceSchema = z
  .object({
    flexRef: z.string().min(1),
    codec: z.enum(CODECS),
  })
  .strict();

/**
 * Marker stored in the datastore record in place of a redirected value
 */
export type BucketReference = z.infer<typeof bucketReferenceSchema>;

export function isBucketReference(value: unknown): value is BucketReference {
  return bucketReferenceSchema.safeParse(value).success;
}

export function toReference(path: string, codec: Codec): BucketReference {
  return { flexRef: path, codec };
}

export const CONTENT_TYPES: Readonly<Record<Codec, string>> = {
  text: "text/plain; charset=utf-8",
  bytes: "application/octet-stream",
  json: "application/json",
  date: "text/plain; charset=utf-8",
};

export interface EncodedPayload {
  codec: Codec;
  body: Buffer;
  contentType: string;
}

type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Single-key wrappers for values JSON has no literal for
 *
 * A plain object with a key starting with `$` is itself wrapped in
 * `{ "$object": ... }`, so user data never reads as a tag.
 */
const TAG_PREFIX = "$";
const DATE_TAG = "$date";
const BYTES_TAG = "$bytes";
const NUMBER_TAG = "$number";
const OBJECT_TAG = "$object";

function toJson(value: EntityValue): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (Object.is(value, -0)) return { [NUMBER_TAG]: "-0" };
    return Number.isFinite(value) ? value : { [NUMBER_TAG]: String(value) };
  }
  if (Buffer.isBuffer(value)) return { [BYTES_TAG]: value.toString("base64") };
  if (value instanceof Date) {
    return {
      [DATE_TAG]: Number.isNaN(value.getTime())
        ? "Invalid Date"
        : value.toISOString(),
    };
  }
  if (Array.isArray(value)) return value.map(toJson);

  const entries = Object.entries(value);
  const fields = Object.fromEntries(
    entries.map(([key, item]) => [key, toJson(item)]),
  );
  return entries.some(([key]) => key.startsWith(TAG_PREFIX))
    ? { [OBJECT_TAG]: fields }
    : fields;
}

function fromJson(field: string, raw: unknown): EntityValue {
  if (
    raw === null ||
    typeof raw === "string" ||
    typeof raw === "number" ||
    typeof raw === "boolean"
  ) {
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item, index) => fromJson(`${field}[${index}]`, item));
  }
  if (typeof raw !== "object") {
    throw new SyntaxError(`Unexpected JSON value in "${field}"`);
  }

  const entries = Object.entries(raw);
  const [only] = entries;
  if (entries.length === 1 && only && only[0].startsWith(TAG_PREFIX)) {
    return fromTagged(field, only[0], only[1]);
  }
  return fieldsFromJson(field, entries);
}

function fromTagged(field: string, tag: string, tagged: unknown): EntityValue {
  if (tag === OBJECT_TAG && typeof tagged === "object" && tagged !== null) {
    return fieldsFromJson(field, Object.entries(tagged));
  }
  if (typeof tagged !== "string") {
    throw new SyntaxError(`Malformed ${tag} value in "${field}"`);
  }
  switch (tag) {
    case DATE_TAG:
      return new Date(tagged);
    case BYTES_TAG:
      return Buffer.from(tagged, "base64");
    case NUMBER_TAG:
      return Number(tagged);
    default:
      throw new SyntaxError(`Unknown tag ${tag} in "${field}"`);
  }
}

function fieldsFromJson(
  field: string,
  entries: [string, unknown][],
): EntityValue {
  return Object.fromEntries(
    entries.map(([key, item]) => [key, fromJson(`${field}.${key}`, item)]),
  );
}

/**
 * Encode a property value
 *
 * The json codec tags nested dates, buffers and non-finite numbers, so every
 * value reads back as it was written.
 */
export function encodeValue(value: EntityValue): EncodedPayload {
  const codec = codecFor(value);
  let body: Buffer;
  if (typeof value === "string") {
    body = Buffer.from(value, "utf-8");
  } else if (Buffer.isBuffer(value)) {
    body = Buffer.from(value);
  } else if (codec === "date" && value instanceof Date) {
    body = Buffer.from(value.toISOString(), "utf-8");
  } else {
    body = Buffer.from(JSON.stringify(toJson(value)), "utf-8");
  }
  return { codec, body, contentType: CONTENT_TYPES[codec] };
}

/**
 * Decode object bytes back into a property value
 *
 * @param property - Property name, for error messages
 * @throws SyntaxError for a malformed JSON body or tag
 * @throws RangeError for a malformed date body
 */
export function decodeValue(
  property: string,
  codec: Codec,
  body: Buffer,
): EntityValue {
  switch (codec) {
    case "text":
      return body.toString("utf-8");
    case "bytes":
      return Buffer.from(body);
    case "date": {
      const text = body.toString("utf-8");
      const date = new Date(text);
      if (Number.isNaN(date.getTime())) {
        throw new RangeError(`Invalid date "${text}"`);
      }
      return date;
    }
    case "json": {
      const parsed: unknown = JSON.parse(body.toString("utf-8"));
      return fromJson(property, parsed);
    }
  }
}

function codecFor(value: EntityValue): Codec {
  if (typeof value === "string") return "text";
  if (Buffer.isBuffer(value)) return "bytes";
  if (value instanceof Date && !Number.isNaN(value.getTime())) return "date";
  return "json";
}

/**
 * Compress a body for writing
 *
 * @returns The bytes to store and the content encoding to record, if any
 */
export async function compress(
  body: Buffer,
  compression: Compression,
  level: number,
): Promise<{ body: Buffer; contentEncoding?: string }> {
  if (compression === "none") return { body };
  return { body: await gzipAsync(body, { level }), contentEncoding: "gzip" };
}

/**
 * Undo the content encoding an object was stored with
 */
export async function decompress(
  body: Buffer,
  contentEncoding: string | undefined,
): Promise<Buffer> {
  if (contentEncoding === "gzip") return gunzipAsync(body);
  return body;
}
