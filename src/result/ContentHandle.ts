import type { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { createTextDecoder, decodeContent } from "../archive/decode";
import { CurlStateError } from "../utils/errors";

/**
 * Where a handle's bytes come from. `open` is called once per pass.
 */
export interface HandleSource {
  readonly name: string;
  /** Backed directly by a file on disk */
  readonly seekable: boolean;
  /** Uncompressed size in bytes, when known up front */
  readonly size?: number;
  /** Character encoding used by `lines()` and `text()`; utf-8 when unset */
  readonly encoding?: string;
  open(): Readable;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  return Buffer.from(String(chunk));
}

/**
 * A file-like view over a local file, a decompressed stream or an archive
 * member. Each handle supports exactly one pass over its content; call
 * {@link reopen} for another one.
 */
export class ContentHandle {
  private consumed = false;
  private closed = false;
  private active: Readable | undefined;

  constructor(private readonly source: HandleSource) {}

  get name(): string {
    return this.source.name;
  }

  get seekable(): boolean {
    return this.source.seekable;
  }

  get size(): number | undefined {
    return this.source.size;
  }

  get encoding(): string | undefined {
    return this.source.encoding;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The raw byte stream.
   * @throws {CurlStateError} If the handle was closed or already consumed
   */
  stream(): Readable {
    if (this.closed) {
      throw new CurlStateError(`Handle for ${this.name} is closed`);
    }
    if (this.consumed) {
      throw new CurlStateError(`Handle for ${this.name} was already read; use reopen() for another pass`);
    }
    this.consumed = true;
    this.active = this.source.open();
    return this.active;
  }

  /**
   * Decoded lines without their terminators.
   */
  async *lines(): AsyncGenerator<string, void, undefined> {
    const decoder = createTextDecoder(this.encoding);
    let rest = "";
    for await (const chunk of this.stream()) {
      const parts = (rest + decoder.decode(toBuffer(chunk), { stream: true })).split(/\r?\n/);
      rest = parts.pop() ?? "";
      yield* parts;
    }
    rest += decoder.decode();
    if (rest !== "") {
      yield rest.replace(/\r$/, "");
    }
  }

  async buffer(): Promise<Buffer> {
    return buffer(this.stream());
  }

  /**
   * The whole content as text. Bytes that do not decode with the handle's
   * encoding are read as latin-1.
   */
  async text(): Promise<string> {
    const decoded = decodeContent(await this.buffer(), this.encoding);
    return typeof decoded === "string" ? decoded : decoded.toString("latin1");
  }

  /**
   * A fresh, unconsumed handle over the same content.
   */
  reopen(): ContentHandle {
    return new ContentHandle(this.source);
  }

  /**
   * Releases the underlying stream. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.active?.destroy();
    this.active = undefined;
  }
}
