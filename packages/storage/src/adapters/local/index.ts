/**
 * Local filesystem bucket adapter
 *
 * Backs `file://` bucket URLs: each object is a file under `baseDir`, with
 * its metadata in a sidecar file beside it.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve } from "node:path";
import {
  StorageError,
  StorageInvalidKeyError,
  StorageNotFoundError,
} from "../../core/errors.js";
import { isValidKey } from "../../core/urls.js";
import type {
  ObjectMetadata,
  Storage,
  StorageConfig,
  StorageLogger,
  WriteOptions,
} from "../../core/types.js";
import { hasErrorCode, readObjectMetadata, writeSidecar } from "./metadata.js";

export interface LocalStorageConfig extends StorageConfig {
  /** Directory the bucket root maps to */
  baseDir: string;
  /** Mode of new files (default: 0o644) */
  fileMode?: number;
  /** Mode of new directories (default: 0o755) */
  dirMode?: number;
}

const noopLogger: StorageLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class LocalStorage implements Storage {
  private readonly baseDir: string;
  private readonly fileMode: number;
  private readonly dirMode: number;
  private readonly logger: StorageLogger;

  constructor(config: LocalStorageConfig) {
    this.baseDir = resolve(config.baseDir);
    this.fileMode = config.fileMode ?? 0o644;
    this.dirMode = config.dirMode ?? 0o755;
    this.logger = config.logger ?? noopLogger;
  }

  async writeBuffer(
    key: string,
    buffer: Buffer,
    options: WriteOptions,
  ): Promise<void> {
    const filePath = this.pathOf(key);
    try {
      await mkdir(dirname(filePath), { recursive: true, mode: this.dirMode });
      await writeFile(filePath, buffer, { mode: this.fileMode });
      await writeSidecar(filePath, {
        contentType: options.contentType,
        contentEncoding: options.contentEncoding,
        cacheControl: options.cacheControl,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new StorageError(`Failed to write ${key}: ${String(error)}`, cause);
    }
    this.logger.debug({ key, size: buffer.length }, "File written");
  }

  async readBuffer(
    key: string,
  ): Promise<{ buffer: Buffer; metadata: ObjectMetadata }> {
    const filePath = this.pathOf(key);
    try {
      const buffer = await readFile(filePath);
      return { buffer, metadata: await readObjectMetadata(filePath) };
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) throw new StorageNotFoundError(key);
      throw error;
    }
  }

  async head(key: string): Promise<ObjectMetadata | null> {
    const filePath = this.pathOf(key);
    try {
      return await readObjectMetadata(filePath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await stat(this.pathOf(key))).isFile();
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return false;
      throw error;
    }
  }

  async close(): Promise<void> {}

  /**
   * Map a key to a file under the base directory
   */
  private pathOf(key: string): string {
    if (!isValidKey(key)) {
      throw new StorageInvalidKeyError(key, "Invalid storage key format");
    }
    const filePath = join(this.baseDir, key);
    if (relative(this.baseDir, filePath).startsWith("..")) {
      throw new StorageInvalidKeyError(key, "Key resolves outside the bucket");
    }
    return filePath;
  }
}
