import path from "node:path";
import { vol } from "memfs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CACHE_DIR_ENV } from "../config";
import { CacheStore, defaultCacheDir } from "./CacheStore";

vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

describe("CacheStore", () => {
  let store: CacheStore;

  beforeEach(() => {
    vol.reset();
    store = new CacheStore("/cache");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should take the cache directory from the environment", () => {
    vi.stubEnv(CACHE_DIR_ENV, "/tmp/biocurl-cache");
    expect(defaultCacheDir()).toBe(path.resolve("/tmp/biocurl-cache"));
  });

  it("should build the cache file path from key and filename", () => {
    expect(store.filePath("abc", "data.tsv")).toBe(path.join("/cache", "abc-data.tsv"));
  });

  it("should create the directory for a target path", async () => {
    expect(await store.targetPath("abc", "data.tsv")).toBe(path.join("/cache", "abc-data.tsv"));
    expect(vol.existsSync("/cache")).toBe(true);
  });

  it("should create the directory of a cache file outside the cache directory", async () => {
    await store.ensureParent("/data/releases/interactions.tsv");
    expect(vol.existsSync("/data/releases")).toBe(true);
  });

  describe("isHit", () => {
    it("should accept non-empty files", async () => {
      vol.fromJSON({ "/cache/abc-data.tsv": "gene\tscore\n" });
      expect(await store.isHit("/cache/abc-data.tsv")).toBe(true);
    });

    it("should treat empty files as misses", async () => {
      vol.fromJSON({ "/cache/abc-data.tsv": "" });
      expect(await store.isHit("/cache/abc-data.tsv")).toBe(false);
    });

    it("should treat missing files as misses", async () => {
      expect(await store.isHit("/cache/abc-data.tsv")).toBe(false);
    });

    it("should treat directories as misses", async () => {
      vol.mkdirSync("/cache/abc-data.tsv", { recursive: true });
      expect(await store.isHit("/cache/abc-data.tsv")).toBe(false);
    });
  });

  describe("invalidate", () => {
    it("should remove the file", async () => {
      vol.fromJSON({ "/cache/abc-data.tsv": "x" });
      expect(await store.invalidate("/cache/abc-data.tsv")).toBe(true);
      expect(vol.existsSync("/cache/abc-data.tsv")).toBe(false);
    });

    it("should report missing files", async () => {
      expect(await store.invalidate("/cache/abc-data.tsv")).toBe(false);
    });
  });

  describe("describe", () => {
    it("should show the size", async () => {
      vol.fromJSON({ "/cache/abc-data.tsv": "12345" });
      expect(await store.describe("/cache/abc-data.tsv")).toBe("/cache/abc-data.tsv (5.00 B)");
    });

    it("should flag empty files", async () => {
      vol.fromJSON({ "/cache/abc-data.tsv": "" });
      expect(await store.describe("/cache/abc-data.tsv")).toBe("/cache/abc-data.tsv (0.00 B, empty)");
    });

    it("should flag files not cached yet", async () => {
      expect(await store.describe("/cache/abc-data.tsv")).toBe("/cache/abc-data.tsv (not cached)");
    });
  });
});
