import { describe, expect, it } from "vitest";
import { InvalidUrlError } from "./errors";
import {
  appendQuery,
  fixUrl,
  getScheme,
  isQuoted,
  isQuotedPlus,
  parseUrlParts,
  quote,
  quotePlus,
  validateUrl,
} from "./url";

describe("URL utilities", () => {
  describe("quote", () => {
    it("should percent-encode spaces and keep slashes", () => {
      expect(quote("some dir/file name.txt")).toBe("some%20dir/file%20name.txt");
    });

    it("should encode multi-byte characters as utf-8 bytes", () => {
      expect(quote("é")).toBe("%C3%A9");
    });

    it("should encode spaces as plus in form encoding", () => {
      expect(quotePlus("TP53 human")).toBe("TP53+human");
      expect(quotePlus("a&b=c", "&=")).toBe("a&b=c");
      expect(quotePlus("a&b")).toBe("a%26b");
    });
  });

  describe("isQuoted", () => {
    it("should recognize encoded paths", () => {
      expect(isQuoted("/a%20b.txt")).toBe(true);
      expect(isQuoted("/plain/path.txt")).toBe(true);
    });

    it("should reject paths with raw spaces", () => {
      expect(isQuoted("/a b.txt")).toBe(false);
    });

    it("should recognize encoded query strings", () => {
      expect(isQuotedPlus("q=a+b&n=1")).toBe(true);
      expect(isQuotedPlus("q=a b")).toBe(false);
    });
  });

  describe("fixUrl", () => {
    it("should encode raw path and query", () => {
      expect(fixUrl("https://example.org/some path/file.txt?q=a b")).toBe(
        "https://example.org/some%20path/file.txt?q=a+b",
      );
    });

    it("should leave encoded URLs alone", () => {
      expect(fixUrl("https://example.org/a%20b.txt?q=a+b")).toBe("https://example.org/a%20b.txt?q=a+b");
    });

    it("should re-encode the query when forced", () => {
      expect(fixUrl("https://example.org/x?q=a+b", true)).toBe("https://example.org/x?q=a%2Bb");
    });

    it("should keep the fragment", () => {
      expect(fixUrl("https://example.org/a b#top")).toBe("https://example.org/a%20b#top");
    });

    it("should return strings without a scheme untouched", () => {
      expect(fixUrl("data/file name.txt")).toBe("data/file name.txt");
    });
  });

  describe("appendQuery", () => {
    it("should append encoded parameters", () => {
      expect(appendQuery("https://example.org/api", { q: "TP53 human", n: "1" })).toBe(
        "https://example.org/api?q=TP53+human&n=1",
      );
    });

    it("should extend an existing query string", () => {
      expect(appendQuery("https://example.org/api?format=tsv", { n: "1" })).toBe(
        "https://example.org/api?format=tsv&n=1",
      );
    });

    it("should return the URL unchanged without parameters", () => {
      expect(appendQuery("https://example.org/api", {})).toBe("https://example.org/api");
      expect(appendQuery("https://example.org/api")).toBe("https://example.org/api");
    });
  });

  describe("getScheme", () => {
    it("should return the lower-cased scheme", () => {
      expect(getScheme("FTP://ftp.example.org/pub/a.gz")).toBe("ftp");
      expect(getScheme("sftp://host/x")).toBe("sftp");
    });

    it("should return undefined for paths", () => {
      expect(getScheme("/tmp/data.tsv")).toBeUndefined();
      expect(getScheme("data.tsv")).toBeUndefined();
    });
  });

  describe("parseUrlParts", () => {
    it("should split domain and filename", () => {
      expect(parseUrlParts("https://example.org/data/file.tsv.gz?x=1")).toEqual({
        domain: "example.org",
        filename: "file.tsv.gz",
      });
    });

    it("should keep the port in the domain", () => {
      expect(parseUrlParts("sftp://example.org:2222/out/a.txt")).toEqual({
        domain: "example.org:2222",
        filename: "a.txt",
      });
    });

    it("should give an empty filename for directory URLs", () => {
      expect(parseUrlParts("https://example.org/").filename).toBe("");
    });
  });

  describe("validateUrl", () => {
    it("should accept absolute URLs", () => {
      expect(() => validateUrl("https://example.org/a")).not.toThrow();
    });

    it("should throw InvalidUrlError otherwise", () => {
      expect(() => validateUrl("not a url")).toThrow(InvalidUrlError);
    });
  });
});
