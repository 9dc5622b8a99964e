import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { ContentHandle } from "../result/ContentHandle";
import { ArchiveError, toError } from "../utils/errors";
import { ArchiveType } from "./ArchiveType";
import type { ArchiveContent, ArchiveOpener, OpenOptions } from "./types";

/**
 * Uncompressed files: read whole, or handed out as a seekable file handle.
 */
export class PlainOpener implements ArchiveOpener {
  canOpen(type: ArchiveType): boolean {
    return type === ArchiveType.Plain;
  }

  async open(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    const name = path.basename(filePath);
    try {
      if (options.large) {
        const { size } = await fs.stat(filePath);
        return {
          kind: "single-stream",
          handle: new ContentHandle({
            name,
            seekable: true,
            size,
            encoding: options.encoding,
            open: () => createReadStream(filePath),
          }),
        };
      }
      const data = await fs.readFile(filePath);
      return { kind: "single", name, data, size: data.length };
    } catch (error) {
      throw new ArchiveError(filePath, "could not read file", toError(error));
    }
  }
}
