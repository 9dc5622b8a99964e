import type { CredentialProvider } from "../credentials/types";

/**
 * One field of a multipart body: a plain value or a file read from disk.
 */
export type MultipartField = readonly [name: string, value: string | { readonly file: string }];

/**
 * Request body, by encoding.
 */
export type TransferBody =
  | { readonly type: "form"; readonly fields: Readonly<Record<string, string>> }
  | { readonly type: "binary"; readonly data: Buffer }
  | { readonly type: "multipart"; readonly fields: ReadonlyArray<MultipartField> };

/**
 * Login details and credential source for SFTP transfers
 */
export interface SftpTarget {
  readonly user?: string;
  readonly password?: string;
  readonly provider?: CredentialProvider;
}

/**
 * Everything a transport needs for one attempt.
 */
export interface TransferRequest {
  readonly url: string;
  readonly method: "GET" | "POST";
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: TransferBody;
  /** Follow HTTP redirects */
  readonly follow: boolean;
  /** Socket inactivity timeout in milliseconds */
  readonly connectTimeout: number;
  /** Total time for the attempt in milliseconds */
  readonly timeout: number;
  /** Ask the server for a gzip transfer encoding */
  readonly compressed: boolean;
  /** Accept bodies cut short by a connection reset once bytes arrived */
  readonly tolerateTruncation: boolean;
  readonly debug: boolean;
  readonly sftp?: SftpTarget;
}

export type ResponseHeaders = Record<string, string | string[]>;

/**
 * Outcome of one attempt that reached the server.
 */
export interface TransferResponse {
  /** HTTP status, or the equivalent inferred for FTP/SFTP */
  status: number;
  /** Response headers with lower-cased names */
  headers: ResponseHeaders;
  /** Bytes written to the target file */
  bytes: number;
}

export type BytesCallback = (downloaded: number, total?: number) => void;

/**
 * Moves the body behind a URL into a local file. Implementations perform a
 * single attempt; retrying is the downloader's business. Failures below the
 * protocol level are thrown as `NetworkError`.
 */
export interface Transport {
  /**
   * Check if this transport can handle the given URL
   */
  canTransfer(url: string): boolean;

  /**
   * Transfer the resource into `target`, overwriting it
   */
  transfer(request: TransferRequest, target: string, onBytes?: BytesCallback): Promise<TransferResponse>;
}
