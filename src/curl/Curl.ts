import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  type ArchiveContent,
  ArchiveType,
  decodeContent,
  isUtf8,
  openArchive,
  sniffArchiveType,
  transcodeFile,
} from "../archive";
import { CacheStore, SingleFlight, computeCacheKey, defaultCacheDir } from "../cache";
import { DEFAULT_USER_AGENT } from "../config";
import { currentContext, preserveCurl, withCurlContext, type CurlContextFlags } from "../context/CurlContext";
import { defaultCredentialProvider, defaultSecretsPath } from "../credentials";
import { ContentHandle } from "../result/ContentHandle";
import { type FetchResult, closeResult, describeResult } from "../result/FetchResult";
import { sessionHeaders } from "../session/cookies";
import { Downloader } from "../transport/Downloader";
import { hasHeader } from "../transport/HttpTransport";
import type { ResponseHeaders, TransferBody, TransferRequest } from "../transport/types";
import { CurlError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { formatBytes } from "../utils/string";
import { appendQuery, fixUrl, getScheme, parseUrlParts, validateUrl } from "../utils/url";
import { FetchState, assertTransition } from "./FetchState";
import { type CurlOptions, type ResolvedCurlOptions, headerRecord, parseCurlOptions } from "./options";

/**
 * One task per cache file at a time, across all instances. Each task reports
 * whether it left a freshly downloaded file behind.
 */
const inFlight = new SingleFlight<boolean>();

function charsetOf(headers: ResponseHeaders): string | undefined {
  const contentType = headers["content-type"];
  const value = Array.isArray(contentType) ? contentType[0] : contentType;
  return value ? /charset=([^\s;]+)/i.exec(value)?.[1]?.replace(/^"|"$/g, "") : undefined;
}

/**
 * Fetches one resource through the cache: downloads it on a miss, then opens,
 * extracts and decodes it.
 *
 * Transfer failures are reported through {@link downloadFailed} and
 * {@link status} rather than thrown; invalid options and corrupt archives
 * throw.
 *
 * @example
 * ```ts
 * const curl = await Curl.fetch({ url: "https://example.org/release/interactions.tsv.gz" });
 * if (!curl.downloadFailed && curl.result?.kind === "blob") {
 *   parse(curl.result.value);
 * }
 * curl.close();
 * ```
 */
export class Curl {
  readonly options: ResolvedCurlOptions;
  /** Final request URL (or absolute local path) */
  readonly url: string;
  readonly domain: string;
  readonly filename: string;
  readonly archiveType: ArchiveType;
  /** True when `url` names a file on this machine */
  readonly isLocal: boolean;

  status = 0;
  downloadFailed = false;
  fromCache = false;
  attempts = 0;
  result: FetchResult | undefined;
  respHeaders: ResponseHeaders = {};
  encoding: string | undefined;
  cacheKey: string | undefined;
  cacheFile: string | undefined;
  outFile: string | undefined;
  /** Uncompressed sizes of the extracted members, where known */
  sizes: Record<string, number> = {};
  members: string[] = [];

  private readonly flags: Readonly<CurlContextFlags>;
  private readonly store: CacheStore;
  private readonly downloader: Downloader;
  private currentState = FetchState.Unfetched;
  private extraHeaders: Record<string, string> = {};
  private running: Promise<this> | undefined;
  private closed = false;

  constructor(options: CurlOptions) {
    this.options = parseCurlOptions(options);
    this.flags = currentContext();
    this.store = new CacheStore(this.options.cacheDir ?? defaultCacheDir());
    this.downloader = new Downloader(this.options.transports);
    this.encoding = this.options.encoding;

    const { url, isLocal } = this.resolveUrl();
    this.url = url;
    this.isLocal = isLocal;
    const parts = isLocal ? { domain: "localhost", filename: path.basename(url) } : parseUrlParts(url);
    this.domain = parts.domain;
    this.filename = parts.filename;
    this.archiveType = sniffArchiveType(this.filename, this.options.compr);

    preserveCurl(this);
  }

  /**
   * Creates a `Curl` and runs it.
   */
  static async fetch(options: CurlOptions): Promise<Curl> {
    return new Curl(options).run();
  }

  get state(): FetchState {
    return this.currentState;
  }

  private get debug(): boolean {
    return this.options.debug || this.flags.debug;
  }

  /**
   * Performs the fetch once; later calls return the same promise.
   */
  run(): Promise<this> {
    this.running ??= this.execute().then(() => this);
    return this.running;
  }

  /**
   * Releases every handle held by the result. Safe to call repeatedly.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    closeResult(this.result);
  }

  private resolveUrl(): { url: string; isLocal: boolean } {
    const { sftpHost, sftpPort, bypassUrlEncoding, forceQuote, get } = this.options;
    let url = this.options.url;

    if (sftpHost) {
      url = `sftp://${sftpHost}:${sftpPort}${url.startsWith("/") ? "" : "/"}${url}`;
    }
    const scheme = getScheme(url);
    if (scheme === "file") {
      return { url: fileURLToPath(url), isLocal: true };
    }
    if (scheme === undefined) {
      return { url: path.resolve(url), isLocal: true };
    }

    if (!bypassUrlEncoding) {
      url = fixUrl(url, forceQuote);
    }
    url = appendQuery(url, get);
    validateUrl(url);
    return { url, isLocal: false };
  }

  private transition(to: FetchState): void {
    assertTransition(this.currentState, to);
    this.currentState = to;
  }

  private report(message: string): void {
    if (this.debug) {
      logger.debug(`:: ${message}`);
    } else if (!this.options.silent) {
      logger.info(`:: ${message}`);
    }
  }

  private async execute(): Promise<void> {
    try {
      if (this.isLocal) {
        await this.fetchLocal();
      } else {
        await this.fetchRemote();
      }
    } catch (error) {
      if (this.currentState !== FetchState.Failed && this.currentState !== FetchState.Ready) {
        this.currentState = FetchState.Failed;
      }
      throw error;
    }
  }

  private async fetchLocal(): Promise<void> {
    const found = await this.store.isHit(this.url);
    if (!found) {
      logger.error(`❌ Local file ${this.url} does not exist or is empty`);
      this.status = 404;
      this.downloadFailed = true;
      this.transition(FetchState.Failed);
      return;
    }
    this.cacheFile = this.url;
    this.fromCache = true;
    this.status = 200;
    this.transition(FetchState.Cached);
    if (this.flags.dryRun) {
      this.transition(FetchState.Ready);
      return;
    }
    await this.deliver(true);
  }

  private async fetchRemote(): Promise<void> {
    const body = await this.loadBody();
    this.cacheKey = computeCacheKey({
      url: this.url,
      post: this.options.post,
      payload: body?.type === "binary" ? body.data : body?.type === "multipart" ? JSON.stringify(body.fields) : undefined,
      algorithm: this.options.hashAlgorithm,
    });
    const cacheFile =
      typeof this.options.cache === "string"
        ? path.resolve(this.options.cache)
        : this.store.filePath(this.cacheKey, this.filename);
    this.cacheFile = cacheFile;
    const useCache = this.flags.cache ?? this.options.cache !== false;

    if (this.flags.cachePrint || this.debug) {
      logger.info(`📦 ${this.url}\n   cache file: ${await this.store.describe(cacheFile)}; using cache: ${useCache}`);
    }
    if (this.flags.dryRun) {
      logger.info(`Dry run: ${this.url} -> ${cacheFile}`);
      this.transition(FetchState.Ready);
      return;
    }
    await this.store.ensureParent(cacheFile);

    let downloaded = false;
    await inFlight.run(cacheFile, async (previousDownloaded) => {
      // a download that finished while this request was queued is as fresh as a new one
      const fresh = previousDownloaded === true;
      if (this.flags.cacheDelete && !fresh) {
        await this.store.invalidate(cacheFile);
      }
      if ((fresh || useCache) && (await this.store.isHit(cacheFile))) {
        this.fromCache = true;
        this.status = 200;
        this.transition(FetchState.Cached);
        this.report(`Loading data from cache previously downloaded from ${this.domain}`);
        return false;
      }
      if (!this.options.call) {
        logger.debug(`Not downloading ${this.url}: cache miss with call disabled`);
        return false;
      }
      this.transition(FetchState.Downloading);
      await this.download(body, cacheFile);
      downloaded = !this.downloadFailed;
      return downloaded;
    });

    if (this.downloadFailed) {
      this.transition(FetchState.Failed);
      return;
    }
    if (!this.fromCache && !downloaded) {
      this.transition(FetchState.Ready);
      return;
    }
    await this.deliver(false);
  }

  private async download(body: TransferBody | undefined, cacheFile: string): Promise<void> {
    await this.openSession();
    this.report(`Downloading \`${this.filename}\` from ${this.domain}`);

    const outcome = await this.downloader.download(this.buildRequest(body), cacheFile, {
      retries: this.options.retries,
      retryDelay: this.options.retryDelay,
      emptyAttemptAgain: this.options.emptyAttemptAgain,
      keepFailed: this.options.keepFailed,
      onProgress: this.options.onProgress,
    });
    this.status = outcome.status;
    this.respHeaders = outcome.headers;
    this.attempts = outcome.attempts;
    this.downloadFailed = outcome.failed;
    if (outcome.failed) {
      return;
    }
    this.report(`${formatBytes(outcome.bytes)} downloaded`);

    this.encoding ??= charsetOf(outcome.headers);
    if (this.archiveType === ArchiveType.Plain && this.encoding !== undefined && !isUtf8(this.encoding)) {
      this.report(`Converting ${this.encoding} encoded data to utf-8`);
      if (await transcodeFile(cacheFile, this.encoding)) {
        this.encoding = "utf-8";
      }
    }
  }

  /**
   * Fetches `initUrl` without the cache and adds the headers derived from
   * its response, by default the `JSESSIONID` cookie.
   */
  private async openSession(): Promise<void> {
    const { initUrl } = this.options;
    if (!initUrl) {
      return;
    }
    this.report("Requesting cookie");
    const initCurl = await withCurlContext({ preserve: false, cache: false }, () =>
      Curl.fetch({
        url: initUrl,
        silent: true,
        debug: this.options.debug,
        cacheDir: this.options.cacheDir,
        retries: this.options.retries,
        retryDelay: this.options.retryDelay,
        process: false,
        transports: this.options.transports,
      }),
    );
    const derive = this.options.initHeaders ?? ((curl: Curl) => sessionHeaders(curl.respHeaders));
    this.extraHeaders = headerRecord(derive(initCurl));
    initCurl.close();
  }

  private async loadBody(): Promise<TransferBody | undefined> {
    const { binaryData, post } = this.options;
    if (Buffer.isBuffer(binaryData)) {
      return { type: "binary", data: binaryData };
    }
    if (typeof binaryData === "string") {
      try {
        return { type: "binary", data: await fs.readFile(binaryData) };
      } catch (error) {
        throw new CurlError(`Cannot read request body from ${binaryData}`, false, toError(error));
      }
    }
    if (Array.isArray(binaryData)) {
      return { type: "multipart", fields: binaryData };
    }
    if (post) {
      return { type: "form", fields: post };
    }
    return undefined;
  }

  private buildRequest(body: TransferBody | undefined): TransferRequest {
    const headers = { ...headerRecord(this.options.reqHeaders), ...this.extraHeaders };
    if (!hasHeader(headers, "user-agent")) {
      headers["User-Agent"] = DEFAULT_USER_AGENT;
    }
    if (this.options.overridePost) {
      headers["X-HTTP-Method-Override"] = "GET";
    }
    const { cacheDir } = this.store;
    return {
      url: this.url,
      method: body ? "POST" : "GET",
      headers,
      body,
      follow: this.options.follow,
      connectTimeout: this.options.connectTimeout,
      timeout: this.options.timeout,
      compressed: this.options.compressed,
      tolerateTruncation: this.options.tolerateTruncation,
      debug: this.debug,
      sftp: {
        user: this.options.sftpUser,
        password: this.options.sftpPasswd,
        provider:
          this.options.credentialProvider ??
          defaultCredentialProvider(this.options.sftpPasswdFile ?? defaultSecretsPath(cacheDir, this.domain.split(":")[0] ?? this.domain)),
      },
    };
  }

  /**
   * Places the file at `outFile`, then opens and decodes it.
   */
  private async deliver(local: boolean): Promise<void> {
    const source = this.cacheFile;
    if (source === undefined) {
      throw new CurlError(`No file to open for ${this.url}`);
    }
    this.outFile = await this.placeOutFile(source, local);
    if (!this.options.process) {
      this.transition(FetchState.Ready);
      return;
    }

    this.transition(FetchState.Extracting);
    this.report(`Opening file \`${this.outFile}\``);
    // a downloaded plain file was transcoded when it entered the cache
    const encoding =
      !local && this.fromCache && this.archiveType === ArchiveType.Plain && this.encoding !== undefined
        ? "utf-8"
        : this.encoding;
    this.encoding = encoding;

    if (this.options.fileObject) {
      const outFile = this.outFile;
      const { size } = await fs.stat(outFile);
      this.sizes = { [path.basename(outFile)]: size };
      this.transition(FetchState.Decoding);
      this.result = {
        kind: "handle",
        handle: new ContentHandle({
          name: path.basename(outFile),
          seekable: true,
          size,
          encoding,
          open: () => createReadStream(outFile),
        }),
      };
    } else {
      this.report(`Extracting ${this.archiveType} data`);
      const content = await openArchive(this.outFile, this.archiveType, {
        large: this.options.large,
        filesNeeded: this.options.filesNeeded,
        encoding,
      });
      this.recordMembers(content);
      this.transition(FetchState.Decoding);
      this.report(`Decoding ${encoding ?? "utf-8"} encoded data`);
      this.result = this.decode(content, encoding);
    }

    this.transition(FetchState.Ready);
    this.report(
      `Ready. Resulted \`${this.archiveType === ArchiveType.Plain ? "plain text" : `${this.archiveType} extracted data`}\` of type ${describeResult(this.result)}. Local file at \`${this.outFile}\`.`,
    );
  }

  private async placeOutFile(source: string, local: boolean): Promise<string> {
    const { outFile } = this.options;
    if (!outFile || path.resolve(outFile) === source) {
      return source;
    }
    const target = path.resolve(outFile);
    await fs.mkdir(path.dirname(target), { recursive: true });
    if (local || this.options.writeCache) {
      await fs.copyFile(source, target);
      return target;
    }
    try {
      await fs.rename(source, target);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
        throw error;
      }
      // across filesystems
      await fs.copyFile(source, target);
      await fs.rm(source, { force: true });
    }
    return target;
  }

  private recordMembers(content: ArchiveContent): void {
    switch (content.kind) {
      case "single":
        this.sizes = { [content.name]: content.size };
        this.members = [content.name];
        break;
      case "single-stream":
        this.sizes = content.handle.size === undefined ? {} : { [content.handle.name]: content.handle.size };
        this.members = [content.handle.name];
        break;
      case "multi":
      case "multi-stream":
        this.sizes = content.sizes;
        this.members = Object.keys(content.members);
        break;
    }
  }

  private decode(content: ArchiveContent, encoding: string | undefined): FetchResult {
    const binary = this.options.defaultMode === "rb";
    const decodeValue = (data: Buffer): string | Buffer => (binary ? data : decodeContent(data, encoding));
    switch (content.kind) {
      case "single":
        return { kind: "blob", value: decodeValue(content.data) };
      case "single-stream":
        return binary ? { kind: "handle", handle: content.handle } : { kind: "lines", handle: content.handle };
      case "multi":
        return {
          kind: "files",
          files: Object.fromEntries(Object.entries(content.members).map(([name, data]) => [name, decodeValue(data)])),
        };
      case "multi-stream":
        return { kind: "streams", streams: content.members };
    }
  }
}
