import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  type GcsBucketHandle,
  type GcsFileHandle,
  type GcsObjectMetadata,
  type GcsSaveOptions,
  GcsStorage,
} from "../adapters/gcs/index.js";
import {
  StorageError,
  StorageInvalidKeyError,
  StorageNotFoundError,
} from "../core/errors.js";

class ApiError extends Error {
  constructor(
    message: string,
    public readonly code: number,
  ) {
    super(message);
  }
}

interface FakeObject {
  generation: string;
  data: Buffer;
  options: GcsSaveOptions | undefined;
}

/**
 * In-process stand-in for a @google-cloud/storage bucket that keeps every
 * generation of an object
 */
class FakeBucket implements GcsBucketHandle {
  readonly generations = new Map<string, FakeObject[]>();
  failWith: Error | null = null;
  /** Runs after object metadata is read, before it is returned */
  afterMetadata: (() => void) | null = null;
  private nextGeneration = 1;

  constructor(readonly name: string) {}

  store(name: string, data: Buffer, options?: GcsSaveOptions): void {
    const versions = this.generations.get(name) ?? [];
    versions.push({
      generation: String(this.nextGeneration++),
      data: Buffer.from(data),
      options,
    });
    this.generations.set(name, versions);
  }

  latest(name: string): FakeObject | undefined {
    return this.generations.get(name)?.at(-1);
  }

  file(name: string, options?: { generation?: string }): GcsFileHandle {
    const bucket = this;
    const missing = () => new ApiError(`No such object: ${name}`, 404);
    const find = () =>
      options?.generation
        ? bucket.generations
            .get(name)
            ?.find((version) => version.generation === options.generation)
        : bucket.latest(name);

    return {
      async save(data, saveOptions) {
        if (bucket.failWith) throw bucket.failWith;
        bucket.store(name, data, saveOptions);
      },
      async download() {
        const stored = find();
        if (!stored) throw missing();
        return [Buffer.from(stored.data)];
      },
      async getMetadata(): Promise<[GcsObjectMetadata]> {
        const stored = find();
        if (!stored) throw missing();
        const metadata: GcsObjectMetadata = {
          contentType: stored.options?.contentType,
          contentEncoding: stored.options?.metadata?.contentEncoding,
          cacheControl: stored.options?.metadata?.cacheControl,
          size: String(stored.data.length),
          generation: stored.generation,
          updated: "2024-01-02T03:04:05.000Z",
        };
        bucket.afterMetadata?.();
        return [metadata];
      },
      async exists() {
        return [find() !== undefined];
      },
    };
  }
}

describe("GcsStorage", () => {
  let bucket: FakeBucket;
  let storage: GcsStorage;

  beforeEach(() => {
    bucket = new FakeBucket("flex-bucket");
    storage = new GcsStorage({ bucket: "flex-bucket", bucketHandle: bucket });
  });

  describe("writeBuffer", () => {
    it("uploads with content type, encoding and cache control", async () => {
      await storage.writeBuffer("g1/u1", Buffer.from("hello"), {
        contentType: "text/plain; charset=utf-8",
        contentEncoding: "gzip",
        cacheControl: "public; max-age=3600",
      });

      const stored = bucket.latest("g1/u1");
      expect(stored?.data.toString()).toBe("hello");
      expect(stored?.options).toEqual({
        contentType: "text/plain; charset=utf-8",
        resumable: false,
        metadata: {
          contentEncoding: "gzip",
          cacheControl: "public; max-age=3600",
        },
      });
    });

    it("places objects under the configured prefix", async () => {
      const prefixed = new GcsStorage({
        bucket: "flex-bucket",
        prefix: "blobs/",
        bucketHandle: bucket,
      });

      await prefixed.writeBuffer("g1/u1", Buffer.from("x"), {
        contentType: "text/plain",
      });

      expect([...bucket.generations.keys()]).toEqual(["blobs/g1/u1"]);
    });

    it("wraps client failures in StorageError", async () => {
      bucket.failWith = new ApiError("quota exceeded", 429);

      const write = storage.writeBuffer("g1/u1", Buffer.from("x"), {
        contentType: "text/plain",
      });

      await expect(write).rejects.toThrow(StorageError);
      await expect(write).rejects.toThrow(
        "Failed to write g1/u1 in gs://flex-bucket: quota exceeded",
      );
    });

    it("rejects invalid keys before calling the client", async () => {
      const file = vi.spyOn(bucket, "file");

      await expect(
        storage.writeBuffer("../x", Buffer.from("x"), {
          contentType: "text/plain",
        }),
      ).rejects.toThrow(StorageInvalidKeyError);
      expect(file).not.toHaveBeenCalled();
    });
  });

  describe("readBuffer", () => {
    it("returns stored bytes and metadata", async () => {
      await storage.writeBuffer("g1/u1", Buffer.from("hello"), {
        contentType: "text/plain",
        contentEncoding: "gzip",
      });

      const { buffer, metadata } = await storage.readBuffer("g1/u1");

      expect(buffer.toString()).toBe("hello");
      expect(metadata.contentType).toBe("text/plain");
      expect(metadata.contentEncoding).toBe("gzip");
      expect(metadata.size).toBe(5);
      expect(metadata.updatedAt.toISOString()).toBe("2024-01-02T03:04:05.000Z");
    });

    it("downloads the generation its metadata describes", async () => {
      await storage.writeBuffer("g1/u1", Buffer.from("old"), {
        contentType: "text/plain",
        contentEncoding: "gzip",
      });
      bucket.afterMetadata = () => {
        bucket.afterMetadata = null;
        bucket.store("g1/u1", Buffer.from("newer"), {
          contentType: "application/json",
        });
      };

      const { buffer, metadata } = await storage.readBuffer("g1/u1");

      expect(buffer.toString()).toBe("old");
      expect(metadata).toMatchObject({
        contentType: "text/plain",
        contentEncoding: "gzip",
        size: 3,
      });
      expect(bucket.latest("g1/u1")?.data.toString()).toBe("newer");
    });

    it("maps 404 to StorageNotFoundError", async () => {
      await expect(storage.readBuffer("g1/missing")).rejects.toThrow(
        StorageNotFoundError,
      );
    });
  });

  describe("head and exists", () => {
    it("reports present and missing objects", async () => {
      await storage.writeBuffer("g1/u1", Buffer.from("abc"), {
        contentType: "text/plain",
      });

      expect(await storage.exists("g1/u1")).toBe(true);
      expect((await storage.head("g1/u1"))?.size).toBe(3);
      expect(await storage.exists("g1/u2")).toBe(false);
      expect(await storage.head("g1/u2")).toBeNull();
    });
  });
});
