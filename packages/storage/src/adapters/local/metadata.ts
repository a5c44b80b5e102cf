/**
 * Sidecar metadata for local objects
 *
 * `g1/u1` keeps its metadata in `g1/u1.meta.json`.
 */

import { readFile, stat, writeFile } from "node:fs/promises";
import type { ObjectMetadata } from "../../core/types.js";

interface Sidecar {
  contentType: string;
  contentEncoding?: string;
  cacheControl?: string;
}

export function sidecarPath(filePath: string): string {
  return `${filePath}.meta.json`;
}

export async function writeSidecar(
  filePath: string,
  sidecar: Sidecar,
): Promise<void> {
  await writeFile(sidecarPath(filePath), JSON.stringify(sidecar), "utf-8");
}

/**
 * Metadata of a stored file; size and time come from the file itself
 *
 * A file written by something else, with no sidecar, reads as raw bytes.
 *
 * @throws The fs error when the file is missing
 */
export async function readObjectMetadata(
  filePath: string,
): Promise<ObjectMetadata> {
  const stats = await stat(filePath);
  const sidecar = await readSidecar(filePath);
  return {
    contentType: sidecar?.contentType ?? "application/octet-stream",
    size: stats.size,
    contentEncoding: sidecar?.contentEncoding,
    cacheControl: sidecar?.cacheControl,
    updatedAt: stats.mtime,
  };
}

async function readSidecar(filePath: string): Promise<Sidecar | null> {
  let content: string;
  try {
    content = await readFile(sidecarPath(filePath), "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return null;
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== "object" || parsed === null) return null;
  return {
    contentType: stringField(parsed, "contentType") ?? "application/octet-stream",
    contentEncoding: stringField(parsed, "contentEncoding"),
    cacheControl: stringField(parsed, "cacheControl"),
  };
}

function stringField(source: object, field: string): string | undefined {
  const value: unknown = Object.getOwnPropertyDescriptor(source, field)?.value;
  return typeof value === "string" ? value : undefined;
}

/**
 * Check a filesystem error's errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
