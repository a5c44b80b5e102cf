import { describe, expect, it } from "vitest";
import { loadFlexEnv } from "../env.js";
import { ConfigurationError } from "../errors.js";

describe("loadFlexEnv", () => {
  it("applies defaults", () => {
    expect(loadFlexEnv({})).toEqual({
      cacheControl: "public; max-age=3600",
      compression: "gzip",
      compressionLevel: 6,
      logLevel: "info",
      environment: "production",
    });
  });

  it("reads every setting", () => {
    expect(
      loadFlexEnv({
        DATASTORE_PROJECT_ID: "test-project",
        DATASTORE_NAMESPACE: "flex",
        CACHE_CONTROL: "no-store",
        FLEX_COMPRESSION: "none",
        FLEX_COMPRESSION_LEVEL: "9",
        LOG_LEVEL: "debug",
        NODE_ENV: "development",
      }),
    ).toEqual({
      projectId: "test-project",
      namespace: "flex",
      cacheControl: "no-store",
      compression: "none",
      compressionLevel: 9,
      logLevel: "debug",
      environment: "development",
    });
  });

  it("falls back to GOOGLE_CLOUD_PROJECT", () => {
    expect(loadFlexEnv({ GOOGLE_CLOUD_PROJECT: "gcp-project" }).projectId).toBe(
      "gcp-project",
    );
    expect(
      loadFlexEnv({
        GOOGLE_CLOUD_PROJECT: "gcp-project",
        DATASTORE_PROJECT_ID: "test-project",
      }).projectId,
    ).toBe("test-project");
  });

  it("treats blank values as unset", () => {
    const env = loadFlexEnv({
      DATASTORE_NAMESPACE: "  ",
      FLEX_COMPRESSION: "",
      FLEX_COMPRESSION_LEVEL: "",
    });

    expect(env.namespace).toBeUndefined();
    expect(env.compression).toBe("gzip");
    expect(env.compressionLevel).toBe(6);
  });

  it("rejects invalid values", () => {
    try {
      loadFlexEnv({ FLEX_COMPRESSION_LEVEL: "12", LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        issues: [
          "FLEX_COMPRESSION_LEVEL: Number must be less than or equal to 9",
          expect.stringMatching(/^LOG_LEVEL: Invalid enum value/),
        ],
      });
    }
  });
});
