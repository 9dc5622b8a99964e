import { Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { CurlStateError } from "../utils/errors";
import { ContentHandle, type HandleSource } from "./ContentHandle";

vi.mock("../utils/logger");

function source(chunks: Buffer[], overrides: Partial<HandleSource> = {}): HandleSource {
  return {
    name: "genes.tsv",
    seekable: false,
    open: () => Readable.from(chunks),
    ...overrides,
  };
}

async function collect(handle: ContentHandle): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of handle.lines()) {
    lines.push(line);
  }
  return lines;
}

describe("ContentHandle", () => {
  it("should expose the source metadata", () => {
    const handle = new ContentHandle(source([], { size: 12, seekable: true, encoding: "latin1" }));
    expect(handle.name).toBe("genes.tsv");
    expect(handle.size).toBe(12);
    expect(handle.seekable).toBe(true);
    expect(handle.encoding).toBe("latin1");
  });

  it("should split lines across chunks and drop terminators", async () => {
    const handle = new ContentHandle(source([Buffer.from("a\tb\r"), Buffer.from("\nc\td\n"), Buffer.from("e")]));
    expect(await collect(handle)).toEqual(["a\tb", "c\td", "e"]);
  });

  it("should not yield a trailing empty line", async () => {
    const handle = new ContentHandle(source([Buffer.from("one\ntwo\n")]));
    expect(await collect(handle)).toEqual(["one", "two"]);
  });

  it("should decode characters split across chunks", async () => {
    const handle = new ContentHandle(source([Buffer.from([0x63, 0x61, 0x66, 0xc3]), Buffer.from([0xa9, 0x0a])]));
    expect(await collect(handle)).toEqual(["café"]);
  });

  it("should decode lines with the handle's encoding", async () => {
    const handle = new ContentHandle(source([Buffer.from([0x63, 0x61, 0x66, 0xe9])], { encoding: "latin1" }));
    expect(await collect(handle)).toEqual(["café"]);
  });

  it("should read the whole content as bytes or text", async () => {
    expect((await new ContentHandle(source([Buffer.from("ab"), Buffer.from("c")])).buffer()).toString()).toBe("abc");
    expect(await new ContentHandle(source([Buffer.from([0xe9])])).text()).toBe("é");
  });

  it("should allow a single pass", async () => {
    const handle = new ContentHandle(source([Buffer.from("x")]));
    await handle.buffer();
    expect(() => handle.stream()).toThrow(CurlStateError);
    expect(await handle.reopen().text()).toBe("x");
  });

  it("should refuse to read after close", () => {
    const handle = new ContentHandle(source([Buffer.from("x")]));
    handle.close();
    handle.close();
    expect(handle.isClosed).toBe(true);
    expect(() => handle.stream()).toThrow(CurlStateError);
  });

  it("should destroy the active stream on close", () => {
    const stream = Readable.from([Buffer.from("x")]);
    const handle = new ContentHandle(source([], { open: () => stream }));
    handle.stream();
    handle.close();
    expect(stream.destroyed).toBe(true);
  });
});
