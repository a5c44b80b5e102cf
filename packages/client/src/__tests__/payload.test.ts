import { gunzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import {
  compress,
  decodeValue,
  decompress,
  encodeValue,
  isBucketReference,
} from "../payload.js";

describe("encodeValue", () => {
  it("writes strings as UTF-8 text", () => {
    const payload = encodeValue("héllo");

    expect(payload.codec).toBe("text");
    expect(payload.contentType).toBe("text/plain; charset=utf-8");
    expect(payload.body.toString("utf-8")).toBe("héllo");
  });

  it("writes buffers as raw bytes", () => {
    const value = Buffer.from([0, 255, 7]);
    const payload = encodeValue(value);

    expect(payload.codec).toBe("bytes");
    expect(payload.contentType).toBe("application/octet-stream");
    expect(payload.body).toEqual(value);
    expect(payload.body).not.toBe(value);
  });

  it("writes dates as ISO strings", () => {
    const payload = encodeValue(new Date("2024-03-01T12:30:00.000Z"));

    expect(payload.codec).toBe("date");
    expect(payload.body.toString("utf-8")).toBe("2024-03-01T12:30:00.000Z");
  });

  it.each([
    [42, "42"],
    [false, "false"],
    [null, "null"],
    [{ a: [1, "x"], b: { c: true } }, '{"a":[1,"x"],"b":{"c":true}}'],
  ])("writes %j as JSON", (value, json) => {
    const payload = encodeValue(value);

    expect(payload.codec).toBe("json");
    expect(payload.contentType).toBe("application/json");
    expect(payload.body.toString("utf-8")).toBe(json);
  });
});

describe("tagged JSON", () => {
  it("tags values JSON has no literal for", () => {
    const payload = encodeValue({
      ratio: Number.NaN,
      limits: [Number.POSITIVE_INFINITY, -0],
      at: new Date("2024-03-01T12:30:00.000Z"),
      raw: Buffer.from("ab"),
    });

    expect(payload.body.toString("utf-8")).toBe(
      '{"ratio":{"$number":"NaN"},' +
        '"limits":[{"$number":"Infinity"},{"$number":"-0"}],' +
        '"at":{"$date":"2024-03-01T12:30:00.000Z"},' +
        '"raw":{"$bytes":"YWI="}}',
    );
  });

  it("wraps objects whose keys start with $", () => {
    const value = { $date: "not a date" };
    const payload = encodeValue(value);

    expect(payload.body.toString("utf-8")).toBe(
      '{"$object":{"$date":"not a date"}}',
    );
    expect(decodeValue("v1", "json", payload.body)).toEqual(value);
  });

  it("reads tagged values back", () => {
    const value = decodeValue(
      "v1",
      "json",
      Buffer.from(
        '[{"$number":"-Infinity"},{"$number":"-0"},{"$bytes":"YWI="},' +
          '{"$date":"2024-03-01T12:30:00.000Z"}]',
      ),
    );

    expect(value).toEqual([
      Number.NEGATIVE_INFINITY,
      -0,
      Buffer.from("ab"),
      new Date("2024-03-01T12:30:00.000Z"),
    ]);
  });

  it("writes an invalid top-level date as tagged JSON", () => {
    const payload = encodeValue(new Date(Number.NaN));

    expect(payload.codec).toBe("json");
    expect(payload.body.toString("utf-8")).toBe('{"$date":"Invalid Date"}');
    const value = decodeValue("v1", "json", payload.body);
    expect(value instanceof Date && Number.isNaN(value.getTime())).toBe(true);
  });

  it.each([
    ['{"$unknown":"x"}', 'Unknown tag $unknown in "v1"'],
    ['{"$number":1}', 'Malformed $number value in "v1"'],
  ])("rejects %s", (body, message) => {
    expect(() => decodeValue("v1", "json", Buffer.from(body))).toThrow(message);
  });
});

describe("decodeValue", () => {
  it("reads nested JSON values", () => {
    expect(
      decodeValue("v1", "json", Buffer.from('{"a":[1,"x"],"b":null}')),
    ).toEqual({ a: [1, "x"], b: null });
  });

  it("reads dates", () => {
    expect(
      decodeValue("v1", "date", Buffer.from("2024-03-01T12:30:00.000Z")),
    ).toEqual(new Date("2024-03-01T12:30:00.000Z"));
  });

  it("rejects malformed bodies", () => {
    expect(() => decodeValue("v1", "json", Buffer.from("{"))).toThrow(
      SyntaxError,
    );
    expect(() => decodeValue("v1", "date", Buffer.from("soon"))).toThrow(
      'Invalid date "soon"',
    );
  });
});

describe("isBucketReference", () => {
  it("recognizes the reference marker", () => {
    expect(isBucketReference({ flexRef: "gs://b/g1/u1", codec: "text" })).toBe(
      true,
    );
  });

  it.each([
    ["a plain string", "gs://b/g1/u1"],
    ["an unknown codec", { flexRef: "gs://b/g1/u1", codec: "xml" }],
    ["extra fields", { flexRef: "gs://b/g1/u1", codec: "text", other: 1 }],
    ["an empty reference", { flexRef: "", codec: "text" }],
    ["null", null],
  ])("rejects %s", (_label, value) => {
    expect(isBucketReference(value)).toBe(false);
  });
});

describe("compress", () => {
  it("gzips and records the content encoding", async () => {
    const stored = await compress(Buffer.from("hello"), "gzip", 9);

    expect(stored.contentEncoding).toBe("gzip");
    expect(gunzipSync(stored.body).toString("utf-8")).toBe("hello");
    expect(await decompress(stored.body, "gzip")).toEqual(Buffer.from("hello"));
  });

  it("passes bodies through when compression is off", async () => {
    const body = Buffer.from("hello");

    expect(await compress(body, "none", 6)).toEqual({ body });
    expect(await decompress(body, undefined)).toBe(body);
  });
});
