import { describe, expect, it } from "vitest";
import { ConfigRegistry, parseFlexConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

function issuesOf(input: unknown): string[] {
  try {
    parseFlexConfig(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseFlexConfig", () => {
  it("normalizes bucket roots and defaults append_key", () => {
    const config = parseFlexConfig({
      v1: { bucket_path: "GS://b/", path_elements: ["group_id", "user_id"] },
    });

    expect(config.get("v1")).toEqual({
      bucketPath: "gs://b",
      pathElements: ["group_id", "user_id"],
      appendKey: false,
    });
  });

  it("accepts an empty path when the key is appended", () => {
    const config = parseFlexConfig({
      v2: { bucket_path: "gs://b/blobs", path_elements: [], append_key: true },
    });

    expect(config.get("v2")?.appendKey).toBe(true);
  });

  it("rejects a bucket path without a scheme", () => {
    expect(
      issuesOf({ v1: { bucket_path: "b", path_elements: ["group_id"] } }),
    ).toEqual(["v1.bucket_path: must be a bucket URL such as gs://bucket"]);
  });

  it("rejects an empty path without append_key", () => {
    expect(
      issuesOf({ v1: { bucket_path: "gs://b", path_elements: [] } }),
    ).toEqual([
      "v1.path_elements: must name at least one field unless append_key is set",
    ]);
  });

  it("rejects unknown fields", () => {
    expect(
      issuesOf({
        v1: { bucket_path: "gs://b", path_elements: ["group_id"], extra: 1 },
      }),
    ).toEqual(["v1: Unrecognized key(s) in object: 'extra'"]);
  });

  it("rejects anything but an object", () => {
    expect(() => parseFlexConfig("v1")).toThrow(ConfigurationError);
    expect(() => parseFlexConfig(null)).toThrow(
      "Invalid property configuration",
    );
  });
});

describe("ConfigRegistry", () => {
  const first = {
    v1: { bucket_path: "gs://first", path_elements: ["group_id"] },
  };
  const second = {
    v1: { bucket_path: "gs://second", path_elements: ["user_id"] },
  };

  it("starts empty", () => {
    const registry = ConfigRegistry.empty();

    expect(registry.size).toBe(0);
    expect(registry.has("v1")).toBe(false);
    expect(registry.properties()).toEqual([]);
  });

  it("lets a later merge win for the same property", () => {
    const registry = ConfigRegistry.from(first).merge(second);

    expect(registry.get("v1")?.bucketPath).toBe("gs://second");
    expect(registry.get("v1")?.pathElements).toEqual(["user_id"]);
    expect(registry.size).toBe(1);
  });

  it("leaves the original registry untouched on merge", () => {
    const original = ConfigRegistry.from(first);

    original.merge({
      ...second,
      v2: { bucket_path: "gs://b", path_elements: ["group_id"] },
    });

    expect(original.size).toBe(1);
    expect(original.get("v1")?.bucketPath).toBe("gs://first");
  });

  it("keeps the previous registry when a merge fails", () => {
    const registry = ConfigRegistry.from(first);

    expect(() => registry.merge({ v1: { bucket_path: "gs://b" } })).toThrow(
      ConfigurationError,
    );
    expect(registry.get("v1")?.bucketPath).toBe("gs://first");
  });

  it("serializes to the wire format", () => {
    const registry = ConfigRegistry.from({
      v1: { bucket_path: "gs://b/", path_elements: ["group_id", "user_id"] },
      v2: { bucket_path: "gs://b/blobs", path_elements: [], append_key: true },
    });

    expect(registry.toJSON()).toEqual({
      v1: { bucket_path: "gs://b", path_elements: ["group_id", "user_id"] },
      v2: { bucket_path: "gs://b/blobs", path_elements: [], append_key: true },
    });
    expect(ConfigRegistry.from(registry.toJSON()).toJSON()).toEqual(
      registry.toJSON(),
    );
  });
});
