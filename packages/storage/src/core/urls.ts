/**
 * Bucket URL utilities
 *
 * Bucket URLs follow the pattern: {scheme}://{location}
 * Examples:
 * - 'gs://my-bucket/blobs/group-1/user-7'
 * - 'file:///var/data/flex/group-1'
 * - 'mem://test-bucket/group-1'
 *
 * The scheme selects the storage adapter, the location is adapter-specific.
 */

/**
 * Parsed bucket URL components
 */
export interface BucketUrl {
  /** Lower-cased scheme, e.g. 'gs' */
  scheme: string;
  /** Everything after '://', without trailing slashes */
  location: string;
}

/**
 * Bucket name plus optional key prefix within it
 */
export interface BucketLocation {
  bucket: string;
  prefix: string;
}

const BUCKET_URL_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(.+)$/i;

/**
 * Check whether a string looks like a bucket URL
 *
 * @example
 * isBucketUrl('gs://my-bucket') // => true
 * isBucketUrl('my-bucket')      // => false
 */
export function isBucketUrl(url: string): boolean {
  const match = BUCKET_URL_PATTERN.exec(url);
  return match !== null && trimSlashes(match[2] ?? "") !== "";
}

/**
 * Parse a bucket URL into scheme and location
 *
 * @returns Parsed components or null if not a bucket URL
 *
 * @example
 * parseBucketUrl('gs://my-bucket/blobs/')
 * // => { scheme: 'gs', location: 'my-bucket/blobs' }
 *
 * parseBucketUrl('file:///var/data')
 * // => { scheme: 'file', location: '/var/data' }
 */
export function parseBucketUrl(url: string): BucketUrl | null {
  const match = BUCKET_URL_PATTERN.exec(url);
  if (!match) return null;

  const scheme = (match[1] ?? "").toLowerCase();
  const location = (match[2] ?? "").replace(/\/+$/, "");
  if (!location) return null;

  return { scheme, location };
}

/**
 * Split a bucket location into bucket name and key prefix
 *
 * @example
 * splitBucketLocation('my-bucket/blobs/v1')
 * // => { bucket: 'my-bucket', prefix: 'blobs/v1' }
 */
export function splitBucketLocation(location: string): BucketLocation {
  const trimmed = trimSlashes(location);
  const slash = trimmed.indexOf("/");
  if (slash === -1) {
    return { bucket: trimmed, prefix: "" };
  }
  return {
    bucket: trimmed.slice(0, slash),
    prefix: trimSlashes(trimmed.slice(slash + 1)),
  };
}

/**
 * Normalize a bucket root URL (lower-case scheme, no trailing slash)
 *
 * @example
 * normalizeBucketRoot('GS://my-bucket/') // => 'gs://my-bucket'
 */
export function normalizeBucketRoot(url: string): string {
  const parsed = parseBucketUrl(url);
  if (!parsed) return url.replace(/\/+$/, "");
  return `${parsed.scheme}://${parsed.location}`;
}

/**
 * Join key components onto a bucket root
 *
 * @example
 * joinBucketPath('gs://b/', 'g1', 'u1') // => 'gs://b/g1/u1'
 */
export function joinBucketPath(root: string, ...components: string[]): string {
  const base = normalizeBucketRoot(root);
  if (components.length === 0) return base;
  return `${base}/${components.join("/")}`;
}

/**
 * Validate a key component (prevent path traversal)
 *
 * @param component - Key component to validate
 * @returns true if valid, false otherwise
 */
export function isValidKeyComponent(component: string): boolean {
  // Reject empty, '.', '..', or components with path separators
  if (!component || component === "." || component === "..") {
    return false;
  }
  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\")
  ) {
    return false;
  }
  return true;
}

/**
 * Validate a full storage key (relative to a bucket root)
 *
 * @param key - Storage key to validate
 * @returns true if valid, false otherwise
 */
export function isValidKey(key: string): boolean {
  if (!key || key.startsWith("/") || key.includes("..")) {
    return false;
  }
  return key.split("/").every(isValidKeyComponent);
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}
