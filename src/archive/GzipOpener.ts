import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream";
import { promisify } from "node:util";
import { createGunzip, gunzip } from "node:zlib";
import { ContentHandle } from "../result/ContentHandle";
import { ArchiveError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ArchiveType } from "./ArchiveType";
import type { ArchiveContent, ArchiveOpener, OpenOptions } from "./types";

const gunzipAsync = promisify(gunzip);

/**
 * Uncompressed size modulo 2^32, from the ISIZE field in the last four bytes
 * of the gzip trailer. `undefined` for files too short to hold one.
 */
export async function readGzipSize(filePath: string): Promise<number | undefined> {
  const handle = await fs.open(filePath, "r");
  try {
    const { size } = await handle.stat();
    if (size < 4) {
      return undefined;
    }
    const trailer = Buffer.alloc(4);
    await handle.read(trailer, 0, 4, size - 4);
    return trailer.readUInt32LE(0);
  } finally {
    await handle.close();
  }
}

/**
 * Single-member gzip files. The member is named after the file without its
 * `.gz` suffix.
 */
export class GzipOpener implements ArchiveOpener {
  canOpen(type: ArchiveType): boolean {
    return type === ArchiveType.Gzip;
  }

  async open(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    const name = path.basename(filePath).replace(/\.gz$/i, "");
    let size: number | undefined;
    try {
      size = await readGzipSize(filePath);
    } catch (error) {
      throw new ArchiveError(filePath, "could not read gzip trailer", toError(error));
    }

    if (options.large) {
      return {
        kind: "single-stream",
        handle: new ContentHandle({
          name,
          seekable: false,
          size,
          encoding: options.encoding,
          open: () =>
            pipeline(createReadStream(filePath), createGunzip(), (error) => {
              if (error) {
                logger.debug(`Reading ${filePath} stopped: ${error.message}`);
              }
            }),
        }),
      };
    }

    let data: Buffer;
    try {
      data = await gunzipAsync(await fs.readFile(filePath));
    } catch (error) {
      throw new ArchiveError(filePath, "not a valid gzip file", toError(error));
    }
    if (size !== undefined && size !== data.length % 2 ** 32) {
      logger.warn(`⚠️ ${filePath}: gzip trailer announces ${size} bytes, got ${data.length}`);
    }
    return { kind: "single", name, data, size: data.length };
  }
}
