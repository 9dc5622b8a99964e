export { Curl } from "./Curl";
export { FetchState, assertTransition, isTerminal } from "./FetchState";
export { curlOptionsSchema, headerRecord, parseCurlOptions } from "./options";
export type { CurlHooks, CurlOptions, ResolvedCurlOptions } from "./options";
