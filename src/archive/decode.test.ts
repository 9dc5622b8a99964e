import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { describe, expect, it, vi } from "vitest";
import { canonicalEncoding, createDecoderStream, createTextDecoder, decodeContent, isUtf8 } from "./decode";

vi.mock("../utils/logger");

describe("decode", () => {
  it("should canonicalize encoding labels", () => {
    expect(canonicalEncoding("utf8")).toBe("utf-8");
    expect(canonicalEncoding(" UTF-8 ")).toBe("utf-8");
    expect(canonicalEncoding("latin1")).toBe("iso-8859-1");
    expect(canonicalEncoding("Latin-1")).toBe("iso-8859-1");
    expect(canonicalEncoding("cp1252")).toBe("windows-1252");
    expect(canonicalEncoding("no-such-encoding")).toBeUndefined();
  });

  it("should treat a missing encoding as utf-8", () => {
    expect(isUtf8(undefined)).toBe(true);
    expect(isUtf8("utf8")).toBe(true);
    expect(isUtf8("iso-8859-1")).toBe(false);
  });

  it("should fall back to utf-8 for unknown labels", () => {
    expect(createTextDecoder("no-such-encoding").encoding).toBe("utf-8");
    expect(createTextDecoder(undefined).encoding).toBe("utf-8");
  });

  it("should keep latin-1 and windows-1252 apart", () => {
    expect(createTextDecoder("iso-8859-1").decode(Buffer.from([0x80, 0x41]))).toBe("\u0080A");
    expect(createTextDecoder("cp1252").decode(Buffer.from([0x80, 0x41]))).toBe("€A");
  });

  describe("decodeContent", () => {
    it("should decode utf-8 by default", () => {
      expect(decodeContent(Buffer.from("naïve\n", "utf8"))).toBe("naïve\n");
    });

    it("should honor the declared encoding", () => {
      expect(decodeContent(Buffer.from([0x63, 0x61, 0x66, 0xe9]), "latin1")).toBe("café");
    });

    it("should read invalid utf-8 as latin-1", () => {
      expect(decodeContent(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe("café");
    });

    it("should map 0x80-0x9f to C1 controls in latin-1", () => {
      expect(decodeContent(Buffer.from([0x80, 0x9f]), "latin1")).toBe("\u0080\u009f");
      expect(decodeContent(Buffer.from([0x80]))).toBe("\u0080");
    });

    it("should try utf-8 for unknown encodings", () => {
      expect(decodeContent(Buffer.from("plain"), "no-such-encoding")).toBe("plain");
    });
  });

  describe("createDecoderStream", () => {
    it("should convert latin-1 to utf-8", async () => {
      const output = await buffer(
        Readable.from([Buffer.from([0x63, 0x61, 0x66, 0xe9])]).pipe(createDecoderStream("latin1")),
      );
      expect(output.toString("utf8")).toBe("café");
    });

    it("should keep characters split across chunks", async () => {
      const output = await buffer(
        Readable.from([Buffer.from([0xc3]), Buffer.from([0xa9, 0x0a])]).pipe(createDecoderStream("utf-8")),
      );
      expect(output.toString("utf8")).toBe("é\n");
    });
  });
});
