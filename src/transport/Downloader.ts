import fs, { type FileHandle } from "node:fs/promises";
import { FAILED_BODY_PREVIEW_BYTES } from "../config";
import type { DownloadProgress, ProgressCallback } from "../types";
import { InvalidUrlError, NetworkError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { FtpTransport } from "./FtpTransport";
import { HttpTransport } from "./HttpTransport";
import { SftpTransport } from "./SftpTransport";
import type { ResponseHeaders, TransferRequest, Transport } from "./types";

export interface DownloadOptions {
  /** Total number of attempts */
  retries: number;
  /** Base delay in milliseconds, doubled after every attempt */
  retryDelay: number;
  /** Retry a 2xx response that delivered no bytes */
  emptyAttemptAgain: boolean;
  /** Leave the target file in place after a failed download */
  keepFailed: boolean;
  onProgress?: ProgressCallback<DownloadProgress>;
}

export interface DownloadOutcome {
  status: number;
  headers: ResponseHeaders;
  bytes: number;
  failed: boolean;
  attempts: number;
}

type AttemptVerdict = "done" | "retry";

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Runs the transfer attempts of one download: picks a transport for the URL,
 * retries transient failures with exponential backoff and cleans up after a
 * download that did not succeed.
 */
export class Downloader {
  private readonly transports: Transport[];

  constructor(transports?: Transport[]) {
    this.transports = transports ?? [new HttpTransport(), new FtpTransport(), new SftpTransport()];
  }

  private async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * @throws {InvalidUrlError} If no transport handles the URL's scheme
   */
  selectTransport(url: string): Transport {
    const transport = this.transports.find((candidate) => candidate.canTransfer(url));
    if (!transport) {
      throw new InvalidUrlError(url);
    }
    return transport;
  }

  async download(request: TransferRequest, target: string, options: DownloadOptions): Promise<DownloadOutcome> {
    const transport = this.selectTransport(request.url);
    const maxAttempts = Math.max(1, options.retries);

    let status = 0;
    let headers: ResponseHeaders = {};
    let bytes = 0;
    let attempts = 0;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      attempts = attempt + 1;
      const hasAttemptsLeft = attempts < maxAttempts;
      let verdict: AttemptVerdict;

      try {
        const response = await transport.transfer(request, target, (downloaded, total) =>
          this.report(options.onProgress, { url: request.url, downloaded, total, attempt: attempts }),
        );
        ({ status, headers, bytes } = response);
        verdict = this.judge(status, bytes, options.emptyAttemptAgain);
      } catch (error: unknown) {
        if (!(error instanceof NetworkError)) {
          await this.discard(target, options.keepFailed);
          throw error;
        }
        logger.debug(`Attempt ${attempts} for ${request.url} threw: ${error.message}`);
        status = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
        headers = {};
        bytes = 0;
        verdict = error.isRetryable ? "retry" : "done";
      }

      if (verdict === "done" || !hasAttemptsLeft) {
        break;
      }
      const delay = options.retryDelay * 2 ** attempt;
      logger.warn(
        `⚠️ Attempt ${attempts}/${maxAttempts} failed for ${request.url} (Status: ${status}, ${bytes} bytes). Retrying in ${delay}ms...`,
      );
      await this.delay(delay);
    }

    const failed = !isSuccess(status) || bytes === 0;
    if (failed) {
      logger.error(`❌ Download of ${request.url} failed after ${attempts} attempt(s) (Status: ${status})`);
      await this.logBodyPreview(target);
      await this.discard(target, options.keepFailed);
    }
    return { status, headers, bytes, failed, attempts };
  }

  /**
   * 5xx and empty successful bodies are worth another attempt; any other
   * status is the server's final answer.
   */
  private judge(status: number, bytes: number, emptyAttemptAgain: boolean): AttemptVerdict {
    if (status >= 500) {
      return "retry";
    }
    if (isSuccess(status) && bytes === 0 && emptyAttemptAgain) {
      return "retry";
    }
    return "done";
  }

  private report(callback: ProgressCallback<DownloadProgress> | undefined, progress: DownloadProgress): void {
    if (!callback) {
      return;
    }
    Promise.resolve(callback(progress)).catch((error: unknown) => {
      logger.warn(`⚠️ Progress callback failed: ${toError(error).message}`);
    });
  }

  private async logBodyPreview(target: string): Promise<void> {
    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(target, "r");
      const buffer = Buffer.alloc(FAILED_BODY_PREVIEW_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, FAILED_BODY_PREVIEW_BYTES, 0);
      if (bytesRead > 0) {
        logger.debug(`Response body (first ${bytesRead} bytes):\n${buffer.subarray(0, bytesRead).toString("utf-8")}`);
      }
    } catch (error) {
      logger.debug(`No response body to show: ${toError(error).message}`);
    } finally {
      await handle?.close();
    }
  }

  private async discard(target: string, keepFailed: boolean): Promise<void> {
    if (keepFailed) {
      logger.info(`📁 Keeping failed download at ${target}`);
      return;
    }
    await fs.rm(target, { force: true });
  }
}
