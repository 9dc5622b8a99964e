import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import axios, { AxiosHeaders, type AxiosResponse } from "axios";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NetworkError } from "../utils/errors";
import { HttpTransport, hasHeader, normalizeHeaders } from "./HttpTransport";
import type { TransferRequest } from "./types";

vi.mock("axios");
vi.mock("../utils/logger");
const mockedAxios = vi.mocked(axios, true);

function response(data: Readable, status = 200, headers: Record<string, string> = {}): AxiosResponse<Readable> {
  return {
    data,
    status,
    statusText: "",
    headers,
    config: { headers: new AxiosHeaders() },
  };
}

/**
 * Emits one chunk, then fails like a socket reset by the peer.
 */
function truncatedStream(chunk: string): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(Buffer.from(chunk));
        return;
      }
      setImmediate(() => this.destroy(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })));
    },
  });
}

const baseRequest: TransferRequest = {
  url: "http://example.test/data.txt",
  method: "GET",
  headers: { "User-Agent": "test-agent" },
  follow: true,
  connectTimeout: 1000,
  timeout: 5000,
  compressed: false,
  tolerateTruncation: false,
  debug: false,
};

describe("HttpTransport", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    mockedAxios.request.mockReset();
    dir = await mkdtemp(path.join(tmpdir(), "http-transport-"));
    target = path.join(dir, "body");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should only handle http and https", () => {
    const transport = new HttpTransport();
    expect(transport.canTransfer("https://example.test/a")).toBe(true);
    expect(transport.canTransfer("HTTP://example.test/a")).toBe(true);
    expect(transport.canTransfer("ftp://example.test/a")).toBe(false);
  });

  it("should stream the body into the target file", async () => {
    mockedAxios.request.mockResolvedValue(
      response(Readable.from([Buffer.from("hello "), Buffer.from("world")]), 200, {
        "Content-Type": "text/plain",
        "Content-Length": "11",
      }),
    );
    const progress: Array<[number, number | undefined]> = [];

    const result = await new HttpTransport().transfer(baseRequest, target, (downloaded, total) =>
      progress.push([downloaded, total]),
    );

    expect(result).toEqual({
      status: 200,
      headers: { "content-type": "text/plain", "content-length": "11" },
      bytes: 11,
    });
    expect(await readFile(target, "utf-8")).toBe("hello world");
    expect(progress).toEqual([
      [6, 11],
      [11, 11],
    ]);
  });

  it("should hand back non-2xx statuses with their body", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("missing")]), 404));

    const result = await new HttpTransport().transfer(baseRequest, target);

    expect(result.status).toBe(404);
    expect(await readFile(target, "utf-8")).toBe("missing");
  });

  it("should set encoding, redirect and timeout options", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));

    await new HttpTransport().transfer({ ...baseRequest, follow: false }, target);

    const config = mockedAxios.request.mock.calls[0]?.[0];
    expect(config?.maxRedirects).toBe(0);
    expect(config?.timeout).toBe(1000);
    expect(config?.responseType).toBe("stream");
    expect(config?.headers).toEqual({ "Accept-Encoding": "identity", "User-Agent": "test-agent" });
  });

  it("should ask for gzip when compressed transfers are enabled", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));

    await new HttpTransport().transfer({ ...baseRequest, compressed: true }, target);

    const config = mockedAxios.request.mock.calls[0]?.[0];
    expect(config?.headers).toMatchObject({ "Accept-Encoding": "gzip, deflate" });
    expect(config?.maxRedirects).toBe(5);
  });

  it("should send form fields url-encoded", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));

    await new HttpTransport().transfer(
      { ...baseRequest, method: "POST", body: { type: "form", fields: { query: "TP53 human", limit: "10" } } },
      target,
    );

    const config = mockedAxios.request.mock.calls[0]?.[0];
    expect(config?.method).toBe("POST");
    expect(String(config?.data)).toBe("query=TP53+human&limit=10");
  });

  it("should label binary bodies as octet-stream", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));
    const data = Buffer.from([1, 2, 3]);

    await new HttpTransport().transfer({ ...baseRequest, method: "POST", body: { type: "binary", data } }, target);

    const config = mockedAxios.request.mock.calls[0]?.[0];
    expect(config?.data).toBe(data);
    expect(config?.headers).toMatchObject({ "Content-Type": "application/octet-stream" });
  });

  it("should keep a caller's content type on binary bodies", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));

    await new HttpTransport().transfer(
      {
        ...baseRequest,
        method: "POST",
        headers: { "Content-Type": "text/tab-separated-values" },
        body: { type: "binary", data: Buffer.from("a\tb\n") },
      },
      target,
    );

    const config = mockedAxios.request.mock.calls[0]?.[0];
    expect(config?.headers).toEqual({ "Accept-Encoding": "identity", "Content-Type": "text/tab-separated-values" });
  });

  it("should build multipart bodies from fields", async () => {
    mockedAxios.request.mockResolvedValue(response(Readable.from([Buffer.from("x")])));

    await new HttpTransport().transfer(
      { ...baseRequest, method: "POST", body: { type: "multipart", fields: [["format", "tsv"]] } },
      target,
    );

    const data = mockedAxios.request.mock.calls[0]?.[0]?.data;
    expect(data).toBeInstanceOf(FormData);
    expect(data instanceof FormData ? data.get("format") : undefined).toBe("tsv");
  });

  it("should wrap request failures in a NetworkError", async () => {
    mockedAxios.request.mockRejectedValue(Object.assign(new Error("getaddrinfo ENOTFOUND"), { code: "ENOTFOUND" }));

    const attempt = new HttpTransport().transfer(baseRequest, target);

    await expect(attempt).rejects.toThrow(NetworkError);
    await expect(attempt).rejects.toThrow(/Code: ENOTFOUND/);
  });

  it("should reject truncated bodies by default", async () => {
    mockedAxios.request.mockResolvedValue(response(truncatedStream("partial")));

    await expect(new HttpTransport().transfer(baseRequest, target)).rejects.toThrow(NetworkError);
  });

  it("should keep truncated bodies when tolerated", async () => {
    mockedAxios.request.mockResolvedValue(response(truncatedStream("partial")));

    const result = await new HttpTransport().transfer({ ...baseRequest, tolerateTruncation: true }, target);

    expect(result).toEqual({ status: 200, headers: {}, bytes: 7 });
  });
});

describe("normalizeHeaders", () => {
  it("should lower-case names and stringify values", () => {
    expect(normalizeHeaders({ "Set-Cookie": ["a=1", "b=2"], "Content-Length": 42, Skip: undefined })).toEqual({
      "set-cookie": ["a=1", "b=2"],
      "content-length": "42",
    });
  });
});

describe("hasHeader", () => {
  it("should match names regardless of case on either side", () => {
    expect(hasHeader({ "User-Agent": "biocurl" }, "user-agent")).toBe(true);
    expect(hasHeader({ "user-agent": "biocurl" }, "User-Agent")).toBe(true);
    expect(hasHeader({ Accept: "*/*" }, "User-Agent")).toBe(false);
  });
});
