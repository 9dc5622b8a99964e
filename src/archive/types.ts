import type { ContentHandle } from "../result/ContentHandle";
import type { ArchiveType } from "./ArchiveType";

export interface OpenOptions {
  /** Stream members through handles instead of reading them into memory */
  large: boolean;
  /** Member names to extract; all members when unset */
  filesNeeded?: readonly string[];
  /** Encoding passed on to streaming handles */
  encoding?: string;
}

/**
 * What an opener produced from one file.
 *
 * Single-file formats yield `single`/`single-stream`; multi-member archives
 * yield `multi`/`multi-stream` keyed by member name.
 */
export type ArchiveContent =
  | { kind: "single"; name: string; data: Buffer; size: number }
  | { kind: "single-stream"; handle: ContentHandle }
  | { kind: "multi"; members: Record<string, Buffer>; sizes: Record<string, number> }
  | { kind: "multi-stream"; members: Record<string, ContentHandle>; sizes: Record<string, number> };

/**
 * Reads one container format.
 */
export interface ArchiveOpener {
  /**
   * Check if this opener reads the given archive type
   */
  canOpen(type: ArchiveType): boolean;

  /**
   * @throws {ArchiveError} If the file is not a valid archive of this type
   */
  open(filePath: string, options: OpenOptions): Promise<ArchiveContent>;
}
