import { z } from "zod";
import { ARCHIVE_TYPE_NAMES } from "../archive/ArchiveType";
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY,
  DEFAULT_SFTP_PORT,
  DEFAULT_TIMEOUT,
} from "../config";
import type { CredentialProvider } from "../credentials/types";
import type { Transport } from "../transport/types";
import type { DownloadProgress, ProgressCallback } from "../types";
import { InvalidOptionsError } from "../utils/errors";
import type { Curl } from "./Curl";

const multipartField = z.tuple([z.string(), z.union([z.string(), z.object({ file: z.string() }).strict()])]);

/**
 * Plain-data options of a fetch. Timeouts and delays are in milliseconds.
 */
export const curlOptionsSchema = z
  .object({
    url: z.string().min(1).describe("Remote URL, remote path with sftpHost, or local file path"),
    silent: z.boolean().default(true),
    get: z.record(z.string()).optional().describe("Query parameters appended to the URL"),
    post: z.record(z.string()).optional().describe("Form fields sent url-encoded"),
    reqHeaders: z
      .union([z.array(z.string()), z.record(z.string())])
      .optional()
      .describe('Request headers, as "Name: value" lines or a record'),
    cache: z
      .union([z.boolean(), z.string()])
      .default(true)
      .describe("Use the cache, or an explicit cache file path"),
    debug: z.boolean().default(false),
    compr: z.enum(ARCHIVE_TYPE_NAMES).optional().describe("Archive type, instead of sniffing the filename"),
    encoding: z.string().optional(),
    filesNeeded: z.array(z.string()).optional(),
    connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT),
    timeout: z.number().int().positive().default(DEFAULT_TIMEOUT),
    follow: z.boolean().default(true),
    large: z.boolean().default(false),
    defaultMode: z.enum(["r", "rb"]).default("r"),
    compressed: z.boolean().default(false),
    binaryData: z
      .union([z.instanceof(Buffer), z.string(), z.array(multipartField)])
      .optional()
      .describe("Request body: bytes, a file to upload, or multipart fields"),
    retries: z.number().int().min(1).default(DEFAULT_RETRIES),
    retryDelay: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY),
    bypassUrlEncoding: z.boolean().default(false),
    emptyAttemptAgain: z.boolean().default(true),
    keepFailed: z.boolean().default(false),
    tolerateTruncation: z.boolean().default(false),
    sftpUser: z.string().optional(),
    sftpPasswd: z.string().optional(),
    sftpPort: z.number().int().positive().default(DEFAULT_SFTP_PORT),
    sftpHost: z.string().optional(),
    sftpPasswdFile: z.string().optional(),
    cacheDir: z.string().optional(),
    outFile: z.string().optional(),
    writeCache: z.boolean().default(true).describe("Copy to outFile instead of moving the cache file"),
    initUrl: z.string().optional().describe("Fetched first to open a session"),
    overridePost: z.boolean().default(false),
    forceQuote: z.boolean().default(false),
    fileObject: z.boolean().default(false).describe("Return the raw file handle"),
    hashAlgorithm: z.enum(["md5", "sha256"]).default("md5"),
    call: z.boolean().default(true).describe("Perform the download on a cache miss"),
    process: z.boolean().default(true).describe("Open and decode the file after fetching"),
  })
  .strict();

/**
 * Callbacks and injected collaborators, not validated by the schema.
 */
export interface CurlHooks {
  onProgress?: ProgressCallback<DownloadProgress>;
  /** Request headers derived from the finished `initUrl` fetch */
  initHeaders?: (initCurl: Curl) => string[];
  credentialProvider?: CredentialProvider;
  transports?: Transport[];
}

export type CurlOptions = z.input<typeof curlOptionsSchema> & CurlHooks;

export type ResolvedCurlOptions = Readonly<z.output<typeof curlOptionsSchema> & CurlHooks>;

/**
 * Applies defaults and validates options.
 * @throws {InvalidOptionsError} On unknown keys or values of the wrong shape
 */
export function parseCurlOptions(options: CurlOptions): ResolvedCurlOptions {
  const { onProgress, initHeaders, credentialProvider, transports, ...data } = options;
  const parsed = curlOptionsSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`),
    );
  }
  return Object.freeze({ ...parsed.data, onProgress, initHeaders, credentialProvider, transports });
}

/**
 * `"Name: value"` lines or a record, as a header record. Lines without a
 * colon are ignored.
 */
export function headerRecord(headers: string[] | Record<string, string> | undefined): Record<string, string> {
  if (!headers) {
    return {};
  }
  if (!Array.isArray(headers)) {
    return { ...headers };
  }
  const record: Record<string, string> = {};
  for (const line of headers) {
    const separator = line.indexOf(":");
    if (separator > 0) {
      record[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
    }
  }
  return record;
}
