import { createWriteStream } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { type Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import axios, { type AxiosRequestConfig, type AxiosResponse } from "axios";
import { DEFAULT_MAX_REDIRECTS } from "../config";
import { NetworkError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import type {
  BytesCallback,
  ResponseHeaders,
  TransferBody,
  TransferRequest,
  TransferResponse,
  Transport,
} from "./types";

// Connection-level codes seen when a server closes the socket right after
// (or shortly before) the last byte.
const TRUNCATION_CODES = new Set([
  "ECONNRESET",
  "EPROTO",
  "ERR_STREAM_PREMATURE_CLOSE",
  "ERR_SSL_DECRYPTION_FAILED_OR_BAD_RECORD_MAC",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function errorStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "response" in error) {
    const response = error.response;
    if (typeof response === "object" && response !== null && "status" in response) {
      return typeof response.status === "number" ? response.status : undefined;
    }
  }
  return undefined;
}

/**
 * Lower-cases header names and keeps string or string-array values.
 */
export function normalizeHeaders(raw: object): ResponseHeaders {
  const headers: ResponseHeaders = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      headers[name.toLowerCase()] = value;
    } else if (typeof value === "number") {
      headers[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      headers[name.toLowerCase()] = value.map((item) => String(item));
    }
  }
  return headers;
}

async function buildBody(
  body: TransferBody | undefined,
): Promise<URLSearchParams | Buffer | FormData | undefined> {
  switch (body?.type) {
    case undefined:
      return undefined;
    case "form":
      return new URLSearchParams(body.fields);
    case "binary":
      return body.data;
    case "multipart": {
      const form = new FormData();
      for (const [name, value] of body.fields) {
        if (typeof value === "string") {
          form.append(name, value);
        } else {
          form.append(name, new Blob([await readFile(value.file)]), path.basename(value.file));
        }
      }
      return form;
    }
  }
}

/**
 * Downloads over HTTP/HTTPS, streaming the body into the target file.
 *
 * Every status is handed back to the caller; non-2xx bodies are written too,
 * so the downloader can log them before discarding the file.
 */
export class HttpTransport implements Transport {
  canTransfer(url: string): boolean {
    return /^https?:\/\//i.test(url);
  }

  async transfer(
    request: TransferRequest,
    target: string,
    onBytes?: BytesCallback,
  ): Promise<TransferResponse> {
    const headers: Record<string, string> = {
      "Accept-Encoding": request.compressed ? "gzip, deflate" : "identity",
      ...request.headers,
    };
    if (request.body?.type === "binary" && !hasHeader(headers, "content-type")) {
      headers["Content-Type"] = "application/octet-stream";
    }

    const config: AxiosRequestConfig = {
      url: request.url,
      method: request.method,
      headers,
      data: await buildBody(request.body),
      responseType: "stream",
      timeout: request.connectTimeout,
      signal: AbortSignal.timeout(request.timeout),
      // Axios follows redirects by default, we need to explicitly disable it if needed
      maxRedirects: request.follow ? DEFAULT_MAX_REDIRECTS : 0,
      decompress: true,
      validateStatus: () => true,
    };

    let response: AxiosResponse<Readable>;
    try {
      response = await axios.request<Readable>(config);
    } catch (error: unknown) {
      throw new NetworkError(
        `Request to ${request.url} failed (Code: ${errorCode(error) ?? "unknown"}): ${toError(error).message}`,
        errorStatus(error),
        toError(error),
      );
    }

    const status = response.status;
    const responseHeaders = normalizeHeaders(response.headers);
    const announced = Number.parseInt(String(responseHeaders["content-length"] ?? ""), 10);
    const total = Number.isNaN(announced) ? undefined : announced;
    if (request.debug) {
      logger.debug(`${request.method} ${request.url} -> ${status} ${JSON.stringify(responseHeaders)}`);
    }

    let bytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytes += chunk.length;
        onBytes?.(bytes, total);
        callback(null, chunk);
      },
    });

    try {
      await pipeline(response.data, counter, createWriteStream(target));
    } catch (error: unknown) {
      const code = errorCode(error);
      if (request.tolerateTruncation && bytes > 0 && code && TRUNCATION_CODES.has(code)) {
        logger.warn(
          `⚠️ Connection to ${request.url} closed early (${code}) after ${bytes} bytes; keeping the data as received.`,
        );
        return { status, headers: responseHeaders, bytes };
      }
      throw new NetworkError(
        `Transfer from ${request.url} interrupted after ${bytes} bytes (Code: ${code ?? "unknown"})`,
        status,
        toError(error),
      );
    }

    return { status, headers: responseHeaders, bytes };
  }
}

/** Case-insensitive lookup of a request header name. */
export function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}
