import { formatBytes } from "../utils/string";
import type { ContentHandle } from "./ContentHandle";

/**
 * What a fetch hands back to its caller.
 *
 * - `blob`: the whole content of a single file, decoded unless bytes were asked for
 * - `files`: archive members read into memory
 * - `streams`: archive members as unread handles (large mode)
 * - `lines`: a single file read lazily, line by line (large mode)
 * - `handle`: the raw file, for callers that parse it themselves
 */
export type FetchResult =
  | { kind: "blob"; value: string | Buffer }
  | { kind: "files"; files: Record<string, string | Buffer> }
  | { kind: "streams"; streams: Record<string, ContentHandle> }
  | { kind: "lines"; handle: ContentHandle }
  | { kind: "handle"; handle: ContentHandle };

export type FetchResultKind = FetchResult["kind"];

/**
 * Releases every handle the result owns. Safe to call more than once.
 */
export function closeResult(result: FetchResult | undefined): void {
  switch (result?.kind) {
    case "streams":
      for (const handle of Object.values(result.streams)) {
        handle.close();
      }
      break;
    case "lines":
    case "handle":
      result.handle.close();
      break;
    default:
      break;
  }
}

function sizeOf(value: string | Buffer): string {
  return formatBytes(typeof value === "string" ? Buffer.byteLength(value) : value.length);
}

export function describeResult(result: FetchResult | undefined): string {
  switch (result?.kind) {
    case undefined:
      return "no result";
    case "blob":
      return `${typeof result.value === "string" ? "text" : "bytes"} (${sizeOf(result.value)})`;
    case "files":
      return `${Object.keys(result.files).length} file(s): ${Object.keys(result.files).join(", ")}`;
    case "streams":
      return `${Object.keys(result.streams).length} stream(s): ${Object.keys(result.streams).join(", ")}`;
    case "lines":
      return `lines of ${result.handle.name}`;
    case "handle":
      return `file handle for ${result.handle.name}`;
  }
}
