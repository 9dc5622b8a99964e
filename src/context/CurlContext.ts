import { AsyncLocalStorage } from "node:async_hooks";
import type { Curl } from "../curl/Curl";

/**
 * Process-wide switches that override per-request settings for the duration
 * of a scope.
 */
export interface CurlContextFlags {
  /**
   * Forces the cache on (`true`) or off (`false`) regardless of the request's
   * own `cache` option. `undefined` leaves the decision to the request.
   */
  cache?: boolean;
  /** Log the cache file and its state for every request */
  cachePrint: boolean;
  /** Delete the cache file before every request, forcing a fresh download */
  cacheDelete: boolean;
  /** Resolve cache paths but perform no I/O and produce no result */
  dryRun: boolean;
  /** Keep the most recent `Curl` instance for inspection */
  preserve: boolean;
  /** Verbose diagnostics for every request */
  debug: boolean;
}

interface ContextFrame {
  flags: Readonly<CurlContextFlags>;
  /** Shared with the enclosing frames, so a preserved instance outlives its scope */
  preserved: { curl?: Curl };
}

const ROOT_FRAME: ContextFrame = {
  flags: Object.freeze({
    cache: undefined,
    cachePrint: false,
    cacheDelete: false,
    dryRun: false,
    preserve: false,
    debug: false,
  }),
  preserved: {},
};

/**
 * Frames live in async-local storage: overrides are seen by everything
 * awaited inside the scope and by nothing running concurrently outside it.
 */
const storage = new AsyncLocalStorage<ContextFrame>();

function currentFrame(): ContextFrame {
  return storage.getStore() ?? ROOT_FRAME;
}

export function currentContext(): Readonly<CurlContextFlags> {
  return currentFrame().flags;
}

/**
 * Runs `fn` with some flags overridden. The previous values are back in
 * effect as soon as `fn` returns, throws, or its promise settles.
 */
export function withCurlContext<T>(overrides: Partial<CurlContextFlags>, fn: () => T): T {
  const parent = currentFrame();
  const frame: ContextFrame = {
    flags: Object.freeze({ ...parent.flags, ...overrides }),
    preserved: parent.preserved,
  };
  return storage.run(frame, fn);
}

export const cacheOn = <T>(fn: () => T): T => withCurlContext({ cache: true }, fn);
export const cacheOff = <T>(fn: () => T): T => withCurlContext({ cache: false }, fn);
export const cachePrintOn = <T>(fn: () => T): T => withCurlContext({ cachePrint: true }, fn);
export const cachePrintOff = <T>(fn: () => T): T => withCurlContext({ cachePrint: false }, fn);
export const cacheDeleteOn = <T>(fn: () => T): T => withCurlContext({ cacheDelete: true }, fn);
export const cacheDeleteOff = <T>(fn: () => T): T => withCurlContext({ cacheDelete: false }, fn);
export const dryRunOn = <T>(fn: () => T): T => withCurlContext({ dryRun: true }, fn);
export const dryRunOff = <T>(fn: () => T): T => withCurlContext({ dryRun: false }, fn);
export const preserveOn = <T>(fn: () => T): T => withCurlContext({ preserve: true }, fn);
export const preserveOff = <T>(fn: () => T): T => withCurlContext({ preserve: false }, fn);
export const debugOn = <T>(fn: () => T): T => withCurlContext({ debug: true }, fn);
export const debugOff = <T>(fn: () => T): T => withCurlContext({ debug: false }, fn);

/**
 * Records `curl` as the latest instance if the current scope preserves them.
 */
export function preserveCurl(curl: Curl): void {
  const frame = currentFrame();
  if (frame.flags.preserve) {
    frame.preserved.curl = curl;
  }
}

/**
 * The last `Curl` created inside a `preserveOn` scope. It stays available
 * after the scope ends, also when the scope threw, until another preserved
 * instance replaces it.
 */
export function lastPreserved(): Curl | undefined {
  return currentFrame().preserved.curl;
}
