import { createReadStream } from "node:fs";
import { PassThrough, type Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import { type Headers, extract } from "tar-stream";
import { ContentHandle } from "../result/ContentHandle";
import { ArchiveError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ArchiveType } from "./ArchiveType";
import { selectMembers } from "./ZipOpener";
import type { ArchiveContent, ArchiveOpener, OpenOptions } from "./types";

/**
 * `skip` leaves the entry unread, `consumed` means the visitor read it to
 * the end, `stop` ends the walk.
 */
type EntryVisitor = (header: Headers, entry: Readable) => Promise<"skip" | "consumed" | "stop">;

/**
 * Regular files with content. Directories, links and empty files are not
 * archive members.
 */
function isMember(header: Headers): boolean {
  return (header.type ?? "file") === "file" && (header.size ?? 0) > 0;
}

async function drain(entry: Readable): Promise<void> {
  for await (const _chunk of entry) {
    // discarded
  }
}

/**
 * Walks the entries of a tar.gz file in order. Skipped entries are drained
 * before moving on.
 */
async function scanTarGz(filePath: string, visit: EntryVisitor): Promise<void> {
  const extractor = extract();
  const controller = new AbortController();

  extractor.on("entry", (header, entry, next) => {
    visit(header, entry)
      .then(async (decision) => {
        if (decision === "stop") {
          controller.abort();
          return;
        }
        if (decision === "skip") {
          await drain(entry);
        }
        next();
      })
      .catch((error: unknown) => extractor.destroy(toError(error)));
  });

  try {
    await pipeline(createReadStream(filePath), createGunzip(), extractor, { signal: controller.signal });
  } catch (error) {
    if (!controller.signal.aborted) {
      throw error;
    }
  }
}

/**
 * Streams one member by reading the archive from the start up to it.
 */
function openMember(filePath: string, name: string): Readable {
  const output = new PassThrough();
  scanTarGz(filePath, async (header, entry) => {
    if (header.name !== name) {
      return "skip";
    }
    await pipeline(entry, output);
    return "stop";
  }).then(
    () => {
      if (!output.writableEnded) {
        output.end();
      }
    },
    (error: unknown) => {
      output.destroy(toError(error));
    },
  );
  return output;
}

/**
 * Gzip-compressed tar archives via tar-stream. Large mode lists the members
 * once, then each handle reopens the archive when it is read.
 */
export class TarGzOpener implements ArchiveOpener {
  canOpen(type: ArchiveType): boolean {
    return type === ArchiveType.TarGz;
  }

  async open(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    const wanted = options.filesNeeded ? new Set(options.filesNeeded) : undefined;
    const sizes: Record<string, number> = {};
    const members: Record<string, Buffer> = {};

    try {
      await scanTarGz(filePath, async (header, entry) => {
        if (!isMember(header)) {
          return "skip";
        }
        sizes[header.name] = header.size ?? 0;
        if (options.large || (wanted && !wanted.has(header.name))) {
          return "skip";
        }
        members[header.name] = await buffer(entry);
        return "consumed";
      });
    } catch (error) {
      throw new ArchiveError(filePath, "not a valid tar.gz file", toError(error));
    }

    const names = selectMembers(Object.keys(sizes), options.filesNeeded);
    const selectedSizes = Object.fromEntries(names.map((name) => [name, sizes[name] ?? 0]));

    if (!options.large) {
      logger.debug(`Extracted ${names.length} member(s) from ${filePath}`);
      return { kind: "multi", members, sizes: selectedSizes };
    }

    const handles: Record<string, ContentHandle> = {};
    for (const name of names) {
      handles[name] = new ContentHandle({
        name,
        seekable: false,
        size: sizes[name],
        encoding: options.encoding,
        open: () => openMember(filePath, name),
      });
    }
    return { kind: "multi-stream", members: handles, sizes: selectedSizes };
  }
}
