import { createReadStream, createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { ArchiveError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { canonicalEncoding, createDecoderStream } from "./decode";

// Output encodings Buffer can write, keyed by their WHATWG names.
const WRITABLE: Readonly<Record<string, BufferEncoding>> = {
  "utf-8": "utf8",
  "utf-16le": "utf16le",
  "iso-8859-1": "latin1",
};

/**
 * Rewrites a plain text file from `from` to `to` in place. The converted
 * content goes to `<file>.transcoding.tmp` first and replaces the original
 * only once complete.
 *
 * @returns whether the file was rewritten
 * @throws {ArchiveError} If reading or writing fails; the original is kept
 */
export async function transcodeFile(filePath: string, from: string, to = "utf-8"): Promise<boolean> {
  const source = canonicalEncoding(from);
  const target = canonicalEncoding(to);
  const output = target === undefined ? undefined : WRITABLE[target];

  if (source === undefined) {
    logger.warn(`⚠️ Unknown encoding \`${from}\`; leaving ${filePath} unchanged`);
    return false;
  }
  if (target === undefined || output === undefined) {
    logger.warn(`⚠️ Cannot write \`${to}\`; leaving ${filePath} unchanged`);
    return false;
  }
  if (source === target) {
    return false;
  }

  const temporary = `${filePath}.transcoding.tmp`;
  try {
    await pipeline(createReadStream(filePath), createDecoderStream(source, output), createWriteStream(temporary));
    await fs.rename(temporary, filePath);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw new ArchiveError(filePath, `transcoding from ${source} to ${target} failed`, toError(error));
  }
  logger.debug(`Transcoded ${filePath} from ${source} to ${target}`);
  return true;
}
