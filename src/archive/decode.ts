import { Transform } from "node:stream";
import { logger } from "../utils/logger";

const UTF8 = "utf-8";
const LATIN1 = "iso-8859-1";

// WHATWG folds these into windows-1252; they are read here as ISO-8859-1,
// so 0x80-0x9F stay C1 controls.
const LATIN1_LABELS = new Set([
  "cp819",
  "csisolatin1",
  "ibm819",
  "iso-8859-1",
  "iso-ir-100",
  "iso8859-1",
  "iso88591",
  "iso_8859-1",
  "iso_8859-1:1987",
  "l1",
  "latin-1",
  "latin1",
]);

/** The subset of `TextDecoder` the readers use. */
export interface TextDecoderLike {
  readonly encoding: string;
  decode(input?: Uint8Array, options?: { stream?: boolean }): string;
}

class Latin1Decoder implements TextDecoderLike {
  readonly encoding = LATIN1;

  decode(input?: Uint8Array): string {
    return input ? Buffer.from(input).toString("latin1") : "";
  }
}

/**
 * The WHATWG name for an encoding label (`utf8` → `utf-8`, `cp1252` →
 * `windows-1252`), `iso-8859-1` for Latin-1 labels, or `undefined` for labels
 * Node cannot decode.
 */
export function canonicalEncoding(label: string): string | undefined {
  const trimmed = label.trim();
  if (LATIN1_LABELS.has(trimmed.toLowerCase())) {
    return LATIN1;
  }
  try {
    return new TextDecoder(trimmed).encoding;
  } catch {
    return undefined;
  }
}

export function isUtf8(label: string | undefined): boolean {
  return label === undefined || canonicalEncoding(label) === UTF8;
}

function decoderFor(encoding: string, fatal = false): TextDecoderLike {
  return encoding === LATIN1 ? new Latin1Decoder() : new TextDecoder(encoding, { fatal });
}

/**
 * A lenient streaming decoder for `label`; unknown labels fall back to utf-8.
 */
export function createTextDecoder(label: string | undefined): TextDecoderLike {
  const encoding = label === undefined ? UTF8 : canonicalEncoding(label);
  if (encoding === undefined) {
    logger.warn(`⚠️ Unknown encoding \`${label}\`, reading as ${UTF8}`);
  }
  return decoderFor(encoding ?? UTF8);
}

/**
 * Decodes bytes as `encoding`, then as latin-1. If neither succeeds the bytes
 * are handed back unchanged.
 */
export function decodeContent(data: Buffer, encoding: string = UTF8): string | Buffer {
  const declared = canonicalEncoding(encoding);
  if (declared === undefined) {
    logger.warn(`⚠️ Unknown encoding \`${encoding}\`, trying ${UTF8}`);
  }
  const attempts = [...new Set([declared ?? UTF8, LATIN1])];
  for (const label of attempts) {
    try {
      return decoderFor(label, true).decode(data);
    } catch (error) {
      logger.debug(`Content is not valid ${label}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  logger.warn(`⚠️ Could not decode ${data.length} bytes as text; returning them as they are`);
  return data;
}

/**
 * Transform from bytes in `from` to bytes in `to`, keeping multi-byte
 * sequences split across chunks intact.
 */
export function createDecoderStream(from: string, to: BufferEncoding = "utf8"): Transform {
  const decoder = createTextDecoder(from);
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      callback(null, Buffer.from(decoder.decode(chunk, { stream: true }), to));
    },
    flush(callback) {
      const rest = decoder.decode();
      callback(null, rest ? Buffer.from(rest, to) : undefined);
    },
  });
}
