/**
 * Cache key generation
 *
 * A download is identified by its final URL, its POST fields and any binary
 * payload. The key is a hex digest over those, so identical requests share a
 * cache file across runs.
 */

import { createHash } from "node:crypto";

export type HashAlgorithm = "md5" | "sha256";

export interface CacheKeyComponents {
  /** Final request URL, query string included */
  readonly url: string;
  /** Form fields; their order does not matter */
  readonly post?: Readonly<Record<string, string>>;
  /** Raw request body or serialized multipart fields */
  readonly payload?: Buffer | string;
  /** Defaults to md5; sha256 where request parameters are untrusted */
  readonly algorithm?: HashAlgorithm;
}

// Filesystem-hostile characters in remote filenames.
const FORBIDDEN_CHARS = /[/\\<>:"?*|]/g;

/**
 * `?k1=v1&k2=v2` with the pairs sorted, or an empty string without fields.
 */
export function serializePost(post?: Readonly<Record<string, string>>): string {
  if (!post) {
    return "";
  }
  const pairs = Object.entries(post)
    .map(([name, value]) => `${name}=${value}`)
    .sort();
  return `?${pairs.join("&")}`;
}

/**
 * Generate a deterministic cache key from request components.
 *
 * @example
 * ```ts
 * computeCacheKey({ url: "https://example.org/a.tsv", post: { q: "TP53" } })
 * // md5 of "https://example.org/a.tsv?q=TP53"
 * ```
 */
export function computeCacheKey(components: CacheKeyComponents): string {
  const { url, post, payload, algorithm = "md5" } = components;
  const hash = createHash(algorithm).update(`${url}${serializePost(post)}`);
  if (payload !== undefined) {
    hash.update(payload);
  }
  return hash.digest("hex");
}

/**
 * Replaces characters that are not allowed in filenames with `_`.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(FORBIDDEN_CHARS, "_");
}

/**
 * `<key>-<sanitized filename>`, or just the key when the URL has no filename.
 */
export function cacheFileName(key: string, filename: string): string {
  const safe = sanitizeFilename(filename);
  return safe ? `${key}-${safe}` : key;
}
