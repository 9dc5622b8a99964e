export * from "./archive";
export * from "./cache";
export * from "./context/CurlContext";
export * from "./credentials";
export * from "./curl";
export { ContentHandle } from "./result/ContentHandle";
export type { HandleSource } from "./result/ContentHandle";
export { closeResult, describeResult } from "./result/FetchResult";
export type { FetchResult, FetchResultKind } from "./result/FetchResult";
export { extractJsessionId, parseSetCookie, sessionHeaders } from "./session/cookies";
export * from "./transport";
export type { DownloadProgress, ProgressCallback } from "./types";
export * from "./utils/errors";
export { LogLevel, logger, parseLogLevel, setLogLevel } from "./utils/logger";
