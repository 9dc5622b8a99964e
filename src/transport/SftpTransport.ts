import fs from "node:fs/promises";
import SftpClient from "ssh2-sftp-client";
import { DEFAULT_SFTP_PORT } from "../config";
import type { CredentialProvider, Credentials } from "../credentials/types";
import { MissingCredentialsError, TransferCancelledError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { BytesCallback, TransferRequest, TransferResponse, Transport } from "./types";

/**
 * The subset of `ssh2-sftp-client` used here.
 */
export interface SftpSession {
  connect(options: { host: string; port: number; username: string; password?: string; readyTimeout?: number }): Promise<unknown>;
  fastGet(remotePath: string, localPath: string, options?: { step?: (transferred: number, chunk: number, total: number) => void }): Promise<string>;
  end(): Promise<unknown>;
}

/**
 * Downloads `sftp://host[:port]/path` with a login from the request or from
 * a credential provider. After a failure the provider chooses between
 * retrying, entering new details, and cancelling.
 */
export class SftpTransport implements Transport {
  constructor(
    private readonly createSession: () => SftpSession = () => new SftpClient(),
    private readonly fallbackProvider?: CredentialProvider,
  ) {}

  canTransfer(url: string): boolean {
    return /^sftp:\/\//i.test(url);
  }

  async transfer(
    request: TransferRequest,
    target: string,
    onBytes?: BytesCallback,
  ): Promise<TransferResponse> {
    const url = new URL(request.url);
    const host = url.hostname;
    const port = url.port ? Number(url.port) : DEFAULT_SFTP_PORT;
    const remotePath = decodeURIComponent(url.pathname);
    const provider = request.sftp?.provider ?? this.fallbackProvider;

    let credentials: Credentials | undefined =
      request.sftp?.user !== undefined
        ? { user: request.sftp.user, password: request.sftp.password ?? "" }
        : await provider?.getCredentials(host, { reenter: false });

    for (;;) {
      if (!credentials) {
        throw new MissingCredentialsError(host, "sftpUser");
      }
      const session = this.createSession();
      try {
        await session.connect({
          host,
          port,
          username: credentials.user,
          password: credentials.password.trim() === "" ? undefined : credentials.password,
          readyTimeout: request.connectTimeout,
        });
        await session.fastGet(remotePath, target, {
          step: (transferred, _chunk, total) => onBytes?.(transferred, total),
        });
        const bytes = (await fs.stat(target)).size;
        return { status: 200, headers: {}, bytes };
      } catch (error: unknown) {
        logger.warn(`⚠️ Failed to get ${remotePath} from ${host}: ${toError(error).message}`);
        const decision = (await provider?.onFailure?.(host, toError(error))) ?? "cancel";
        if (decision === "cancel") {
          throw new TransferCancelledError(request.url, toError(error).message);
        }
        if (decision === "reenter") {
          credentials = await provider?.getCredentials(host, { reenter: true });
        }
      } finally {
        await session.end().catch((error: unknown) => {
          logger.debug(`Closing SFTP session to ${host} failed: ${toError(error).message}`);
        });
      }
    }
  }
}
