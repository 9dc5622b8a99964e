export { CacheStore, defaultCacheDir } from "./CacheStore";
export { SingleFlight } from "./SingleFlight";
export {
  cacheFileName,
  computeCacheKey,
  sanitizeFilename,
  serializePost,
} from "./CacheKey";
export type { CacheKeyComponents, HashAlgorithm } from "./CacheKey";
