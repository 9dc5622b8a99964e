import fs from "node:fs/promises";
import { PassThrough, type Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import JSZip from "jszip";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import { ContentHandle } from "../result/ContentHandle";
import { ArchiveError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ArchiveType } from "./ArchiveType";
import type { ArchiveContent, ArchiveOpener, OpenOptions } from "./types";

/**
 * Members to extract, in archive order. Directories are never members.
 */
export function selectMembers(names: readonly string[], filesNeeded?: readonly string[]): string[] {
  if (!filesNeeded) {
    return [...names];
  }
  const wanted = new Set(filesNeeded);
  const missing = filesNeeded.filter((name) => !names.includes(name));
  if (missing.length > 0) {
    logger.warn(`⚠️ Requested members not found in archive: ${missing.join(", ")}`);
  }
  return names.filter((name) => wanted.has(name));
}

function openZipFile(filePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(error ?? new Error(`could not open ${filePath}`));
      } else {
        resolve(zipfile);
      }
    });
  });
}

/**
 * The next central directory entry, or `undefined` after the last one.
 */
function nextEntry(zipfile: ZipFile): Promise<Entry | undefined> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: Entry) => {
      detach();
      resolve(entry);
    };
    const onEnd = () => {
      detach();
      resolve(undefined);
    };
    const onError = (error: Error) => {
      detach();
      reject(error);
    };
    const detach = () => {
      zipfile.off("entry", onEntry);
      zipfile.off("end", onEnd);
      zipfile.off("error", onError);
    };
    zipfile.on("entry", onEntry);
    zipfile.on("end", onEnd);
    zipfile.on("error", onError);
    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`could not read ${entry.fileName}`));
      } else {
        resolve(stream);
      }
    });
  });
}

/**
 * File members and their uncompressed sizes, read from the central directory
 * without inflating anything.
 */
async function listZip(filePath: string): Promise<Array<[string, number]>> {
  const zipfile = await openZipFile(filePath);
  try {
    const entries: Array<[string, number]> = [];
    for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
      if (!entry.fileName.endsWith("/")) {
        entries.push([entry.fileName, entry.uncompressedSize]);
      }
    }
    return entries;
  } finally {
    zipfile.close();
  }
}

async function copyZipMember(filePath: string, name: string, output: PassThrough): Promise<void> {
  const zipfile = await openZipFile(filePath);
  try {
    for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
      if (entry.fileName === name) {
        await pipeline(await openEntryStream(zipfile, entry), output);
        return;
      }
    }
    throw new ArchiveError(filePath, `no member named ${name}`);
  } finally {
    zipfile.close();
  }
}

/**
 * Streams one member straight from the file on disk.
 */
function openZipMember(filePath: string, name: string): Readable {
  const output = new PassThrough();
  copyZipMember(filePath, name, output).catch((error: unknown) => {
    output.destroy(toError(error));
  });
  return output;
}

/**
 * Zip archives. Buffered mode inflates the selected members with jszip; large
 * mode reads the central directory with yauzl and inflates each member from
 * disk when its handle is read, so the archive is never held in memory.
 */
export class ZipOpener implements ArchiveOpener {
  canOpen(type: ArchiveType): boolean {
    return type === ArchiveType.Zip;
  }

  async open(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    return options.large ? this.openStreaming(filePath, options) : this.openBuffered(filePath, options);
  }

  private async openStreaming(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    let entries: Array<[string, number]>;
    try {
      entries = await listZip(filePath);
    } catch (error) {
      throw new ArchiveError(filePath, "not a valid zip file", toError(error));
    }
    const allSizes = new Map(entries);
    const names = selectMembers(
      entries.map(([name]) => name),
      options.filesNeeded,
    );

    const members: Record<string, ContentHandle> = {};
    const sizes: Record<string, number> = {};
    for (const name of names) {
      const size = allSizes.get(name);
      if (size !== undefined) {
        sizes[name] = size;
      }
      members[name] = new ContentHandle({
        name,
        seekable: false,
        size,
        encoding: options.encoding,
        open: () => openZipMember(filePath, name),
      });
    }
    return { kind: "multi-stream", members, sizes };
  }

  private async openBuffered(filePath: string, options: OpenOptions): Promise<ArchiveContent> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(new Uint8Array(await fs.readFile(filePath)));
    } catch (error) {
      throw new ArchiveError(filePath, "not a valid zip file", toError(error));
    }

    const files = Object.values(zip.files).filter((entry) => !entry.dir);
    const names = selectMembers(
      files.map((entry) => entry.name),
      options.filesNeeded,
    );

    const members: Record<string, Buffer> = {};
    const sizes: Record<string, number> = {};
    for (const name of names) {
      const entry = zip.file(name);
      if (!entry) {
        continue;
      }
      let data: Buffer;
      try {
        data = await entry.async("nodebuffer");
      } catch (error) {
        throw new ArchiveError(filePath, `could not inflate ${name}`, toError(error));
      }
      members[name] = data;
      sizes[name] = data.length;
    }
    return { kind: "multi", members, sizes };
  }
}
