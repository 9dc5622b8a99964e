import fs from "node:fs/promises";
import path from "node:path";
import envPaths from "env-paths";
import { APP_NAME, CACHE_DIR_ENV } from "../config";
import { formatBytes } from "../utils/string";
import { logger } from "../utils/logger";
import { cacheFileName } from "./CacheKey";

/**
 * Cache directory from `BIOCURL_CACHE_DIR`, else the platform cache directory.
 */
export function defaultCacheDir(): string {
  const fromEnv = process.env[CACHE_DIR_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }
  return envPaths(APP_NAME, { suffix: "" }).cache;
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Maps cache keys to files in one directory and answers hit/miss questions.
 *
 * ```
 * <cacheDir>/
 * ├── 5d41402abc4b2a76b9719d911017c592-interactions.tsv.gz
 * └── 7d793037a0760186574b0282f2f435e7-release.zip
 * ```
 *
 * Files are only created by downloads and only removed by {@link invalidate}.
 */
export class CacheStore {
  readonly cacheDir: string;

  constructor(cacheDir: string = defaultCacheDir()) {
    this.cacheDir = path.resolve(cacheDir);
  }

  /**
   * Creates the directory a cache file goes in; also used for cache files
   * placed outside {@link cacheDir}.
   */
  async ensureParent(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  }

  /**
   * Path of the cache file for a key, without touching the disk.
   */
  filePath(key: string, filename: string): string {
    return path.join(this.cacheDir, cacheFileName(key, filename));
  }

  /**
   * Path of the cache file for a key; creates the cache directory if needed.
   */
  async targetPath(key: string, filename: string): Promise<string> {
    const filePath = this.filePath(key, filename);
    await this.ensureParent(filePath);
    return filePath;
  }

  /**
   * A file is usable only if it exists and is not empty.
   */
  async isHit(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() && stats.size > 0;
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Deletes a cache file. Returns whether something was removed; failures
   * other than a missing file are logged and reported as `false`.
   */
  async invalidate(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      logger.debug(`🗑️ Removed cache file ${filePath}`);
      return true;
    } catch (error) {
      if (!hasCode(error, "ENOENT")) {
        logger.error(
          `⚠️ Could not remove cache file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return false;
    }
  }

  /**
   * One-line summary of a cache file for cache-print mode.
   */
  async describe(filePath: string): Promise<string> {
    try {
      const stats = await fs.stat(filePath);
      return `${filePath} (${formatBytes(stats.size)}${stats.size === 0 ? ", empty" : ""})`;
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        return `${filePath} (not cached)`;
      }
      throw error;
    }
  }
}
