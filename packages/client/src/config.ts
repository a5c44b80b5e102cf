/**
 * Property configuration
 *
 * Maps a property name to the bucket its payload lives in and the sibling
 * fields its object path is built from:
 *
 * ```json
 * {
 *   "v1": { "bucket_path": "gs://b", "path_elements": ["group_id", "user_id"] }
 * }
 * ```
 */

import { isBucketUrl, normalizeBucketRoot } from "@datastore-flex/storage";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const propertyConfigSchema = z
  .object({
    bucket_path: z.string().refine(isBucketUrl, {
      message: "must be a bucket URL such as gs://bucket",
    }),
    path_elements: z.array(z.string().min(1, "field names must not be empty")),
    append_key: z.boolean().optional(),
  })
  .strict()
  .refine(
    (config) => config.path_elements.length > 0 || config.append_key === true,
    {
      message: "must name at least one field unless append_key is set",
      path: ["path_elements"],
    },
  );

export const flexConfigSchema = z.record(
  z.string().min(1, "property names must not be empty"),
  propertyConfigSchema,
);

/**
 * Configuration in its wire format
 */
export type FlexConfigInput = z.input<typeof flexConfigSchema>;

/**
 * Configuration of one redirected property
 */
export interface PropertyConfig {
  /** Normalized bucket root URL, e.g. 'gs://b' */
  readonly bucketPath: string;
  /** Entity fields whose values form the object path, in order */
  readonly pathElements: readonly string[];
  /** Append the entity key's id or name as the last path component */
  readonly appendKey: boolean;
}

/**
 * Validate a configuration and convert it to PropertyConfig entries
 *
 * @throws ConfigurationError listing every issue found
 */
export function parseFlexConfig(input: unknown): Map<string, PropertyConfig> {
  const result = flexConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid property configuration",
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const entries = new Map<string, PropertyConfig>();
  for (const [property, config] of Object.entries(result.data)) {
    entries.set(
      property,
      Object.freeze({
        bucketPath: normalizeBucketRoot(config.bucket_path),
        pathElements: Object.freeze([...config.path_elements]),
        appendKey: config.append_key ?? false,
      }),
    );
  }
  return entries;
}

/**
 * Immutable set of property configurations
 *
 * Merging returns a new registry, so a client can swap registries while
 * operations that already started keep the one they read.
 */
export class ConfigRegistry {
  private constructor(
    private readonly entries: ReadonlyMap<string, PropertyConfig>,
  ) {}

  static empty(): ConfigRegistry {
    return new ConfigRegistry(new Map());
  }

  static from(input: unknown): ConfigRegistry {
    return ConfigRegistry.empty().merge(input);
  }

  /**
   * Validate `input` and overlay it; later entries win per property
   */
  merge(input: unknown): ConfigRegistry {
    const merged = new Map(this.entries);
    for (const [property, config] of parseFlexConfig(input)) {
      merged.set(property, config);
    }
    return new ConfigRegistry(merged);
  }

  get(property: string): PropertyConfig | undefined {
    return this.entries.get(property);
  }

  has(property: string): boolean {
    return this.entries.has(property);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Configured properties in insertion order
   */
  properties(): [string, PropertyConfig][] {
    return [...this.entries];
  }

  /**
   * The configuration in its wire format
   */
  toJSON(): Record<string, z.output<typeof propertyConfigSchema>> {
    return Object.fromEntries(
      [...this.entries].map(([property, config]) => [
        property,
        {
          bucket_path: config.bucketPath,
          path_elements: [...config.pathElements],
          ...(config.appendKey ? { append_key: true } : {}),
        },
      ]),
    );
  }
}
