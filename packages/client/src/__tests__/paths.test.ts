import { describe, expect, it } from "vitest";
import type { Entity } from "@datastore-flex/datastore";
import type { PropertyConfig } from "../config.js";
import { InvalidPathElementError, MissingFieldError } from "../errors.js";
import { deriveLocation, KEY_FIELD, pathComponents } from "../paths.js";

const config: PropertyConfig = {
  bucketPath: "gs://b",
  pathElements: ["group_id", "user_id"],
  appendKey: false,
};

function profile(
  data: Entity["data"],
  key: Entity["key"] = { kind: "Profile", name: "u1" },
): Entity {
  return { key, data };
}

describe("deriveLocation", () => {
  it("joins the path field values onto the bucket root", () => {
    const entity = profile({ group_id: "g1", user_id: "u1", v1: "hello" });

    expect(deriveLocation(entity, "v1", config)).toEqual({
      bucketPath: "gs://b",
      key: "g1/u1",
      path: "gs://b/g1/u1",
    });
  });

  it("derives the same path on every call", () => {
    const entity = profile({ group_id: "g1", user_id: "u1" });

    expect(deriveLocation(entity, "v1", config)).toEqual(
      deriveLocation(profile({ user_id: "u1", group_id: "g1" }), "v1", config),
    );
  });

  it("stringifies numbers", () => {
    const entity = profile({ group_id: 12, user_id: 7.5 });

    expect(deriveLocation(entity, "v1", config).path).toBe("gs://b/12/7.5");
  });

  it("appends the key id or name when configured", () => {
    const withKey = { ...config, appendKey: true };

    expect(
      deriveLocation(
        profile(
          { group_id: "g1", user_id: "u1" },
          { kind: "Profile", id: "42" },
        ),
        "v1",
        withKey,
      ).key,
    ).toBe("g1/u1/42");
    expect(
      pathComponents(profile({ group_id: "g1", user_id: "u1" }), "v1", withKey),
    ).toEqual(["g1", "u1", "u1"]);
  });
});

describe("pathComponents", () => {
  it("fails on an absent field", () => {
    const entity = profile({ group_id: "g1", v1: "hello" });

    expect(() => pathComponents(entity, "v1", config)).toThrow(
      new MissingFieldError("v1", "user_id", 'Profile("u1")'),
    );
  });

  it("treats null as absent", () => {
    const entity = profile({ group_id: "g1", user_id: null });

    expect(() => pathComponents(entity, "v1", config)).toThrow(
      MissingFieldError,
    );
  });

  it("reports the key when it has neither id nor name", () => {
    const entity = profile(
      { group_id: "g1", user_id: "u1" },
      { kind: "Profile" },
    );

    try {
      pathComponents(entity, "v1", { ...config, appendKey: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingFieldError);
      expect(error).toMatchObject({ field: KEY_FIELD, entityKey: "Profile(?)" });
    }
  });

  it("skips the key when asked to", () => {
    const entity = profile(
      { group_id: "g1", user_id: "u1" },
      { kind: "Profile" },
    );

    expect(
      pathComponents(entity, "v1", { ...config, appendKey: true }, false),
    ).toEqual(["g1", "u1"]);
  });

  it.each([
    ["a boolean", true],
    ["an object", { id: "u1" }],
    ["a list", ["u1"]],
    ["a date", new Date("2024-01-01T00:00:00.000Z")],
    ["a separator", "a/b"],
    ["a parent reference", ".."],
    ["an empty string", ""],
    ["a non-finite number", Number.NaN],
  ])("rejects %s", (_label, value) => {
    const entity = profile({ group_id: "g1", user_id: value });

    expect(() => pathComponents(entity, "v1", config)).toThrow(
      InvalidPathElementError,
    );
  });
});
