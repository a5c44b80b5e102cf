/**
 * Environment configuration
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_CACHE_CONTROL = "public; max-age=3600";
export const DEFAULT_COMPRESSION_LEVEL = 6;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const blankAsUndefined = (value: unknown) =>
  value === "" ? undefined : value;

const envSchema = z.object({
  DATASTORE_PROJECT_ID: optionalString,
  GOOGLE_CLOUD_PROJECT: optionalString,
  DATASTORE_NAMESPACE: optionalString,
  CACHE_CONTROL: optionalString,
  FLEX_COMPRESSION: z.preprocess(
    blankAsUndefined,
    z.enum(["gzip", "none"]).default("gzip"),
  ),
  FLEX_COMPRESSION_LEVEL: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(0).max(9).default(DEFAULT_COMPRESSION_LEVEL),
  ),
  NODE_ENV: optionalString,
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info"),
  ),
});

export interface FlexEnv {
  projectId?: string;
  namespace?: string;
  cacheControl: string;
  compression: "gzip" | "none";
  compressionLevel: number;
  logLevel: string;
  environment: string;
}

/**
 * Read client settings from environment variables
 *
 * @throws ConfigurationError naming every invalid variable
 */
export function loadFlexEnv(
  env: Record<string, string | undefined> = process.env,
): FlexEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment",
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  const parsed = result.data;
  return {
    projectId: parsed.DATASTORE_PROJECT_ID ?? parsed.GOOGLE_CLOUD_PROJECT,
    namespace: parsed.DATASTORE_NAMESPACE,
    cacheControl: parsed.CACHE_CONTROL ?? DEFAULT_CACHE_CONTROL,
    compression: parsed.FLEX_COMPRESSION,
    compressionLevel: parsed.FLEX_COMPRESSION_LEVEL,
    logLevel: parsed.LOG_LEVEL,
    environment: parsed.NODE_ENV ?? "production",
  };
}
