import { CurlError } from "../utils/errors";
import type { ArchiveType } from "./ArchiveType";
import { GzipOpener } from "./GzipOpener";
import { PlainOpener } from "./PlainOpener";
import { TarGzOpener } from "./TarGzOpener";
import { ZipOpener } from "./ZipOpener";
import type { ArchiveContent, ArchiveOpener, OpenOptions } from "./types";

export * from "./ArchiveType";
export * from "./decode";
export * from "./GzipOpener";
export * from "./PlainOpener";
export * from "./TarGzOpener";
export * from "./transcode";
export * from "./types";
export * from "./ZipOpener";

const openers: readonly ArchiveOpener[] = [
  new PlainOpener(),
  new GzipOpener(),
  new ZipOpener(),
  new TarGzOpener(),
];

/**
 * Opens `filePath` with the opener for `type`.
 */
export async function openArchive(
  filePath: string,
  type: ArchiveType,
  options: OpenOptions,
): Promise<ArchiveContent> {
  const opener = openers.find((candidate) => candidate.canOpen(type));
  if (!opener) {
    throw new CurlError(`No opener for archive type ${type}`);
  }
  return opener.open(filePath, options);
}
