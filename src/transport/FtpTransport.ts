import fs from "node:fs/promises";
import { type AccessOptions, Client, FTPError, type FTPResponse } from "basic-ftp";
import { NetworkError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { BytesCallback, TransferRequest, TransferResponse, Transport } from "./types";

/** Reply code of a completed data transfer */
const TRANSFER_COMPLETE = 226;

/**
 * The subset of the `basic-ftp` client used here.
 */
export interface FtpSession {
  ftp: { verbose: boolean };
  trackProgress(handler?: (info: { bytes: number }) => void): void;
  access(options: AccessOptions): Promise<FTPResponse>;
  downloadTo(destination: string, fromRemotePath: string): Promise<FTPResponse>;
  close(): void;
}

/**
 * Downloads over FTP. There is no status line, so success is inferred from
 * the `226 Transfer complete` reply; permanent FTP errors (5xx replies such
 * as `550 No such file`) are reported as 404 and not retried.
 */
export class FtpTransport implements Transport {
  constructor(private readonly createClient: (timeout: number) => FtpSession = (timeout) => new Client(timeout)) {}

  canTransfer(url: string): boolean {
    return /^ftp:\/\//i.test(url);
  }

  async transfer(
    request: TransferRequest,
    target: string,
    onBytes?: BytesCallback,
  ): Promise<TransferResponse> {
    const url = new URL(request.url);
    const client = this.createClient(request.connectTimeout);
    client.ftp.verbose = request.debug;
    client.trackProgress((info) => onBytes?.(info.bytes));

    try {
      await client.access({
        host: url.hostname,
        port: url.port ? Number(url.port) : 21,
        user: decodeURIComponent(url.username) || "anonymous",
        password: decodeURIComponent(url.password) || "anonymous@",
      });
      const reply = await client.downloadTo(target, decodeURIComponent(url.pathname));
      const bytes = (await fs.stat(target)).size;
      logger.debug(`FTP ${request.url}: ${reply.code} ${reply.message}`);
      return {
        status: reply.code === TRANSFER_COMPLETE ? 200 : 500,
        headers: { "ftp-reply": `${reply.code} ${reply.message}` },
        bytes,
      };
    } catch (error: unknown) {
      if (error instanceof FTPError && error.code >= 500) {
        logger.warn(`⚠️ FTP server refused ${request.url}: ${error.code} ${error.message}`);
        return { status: 404, headers: { "ftp-reply": `${error.code} ${error.message}` }, bytes: 0 };
      }
      throw new NetworkError(
        `FTP transfer of ${request.url} failed: ${toError(error).message}`,
        undefined,
        toError(error),
      );
    } finally {
      client.trackProgress();
      client.close();
    }
  }
}
