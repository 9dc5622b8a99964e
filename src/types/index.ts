/**
 * Generic progress callback type
 */
export type ProgressCallback<T> = (progress: T) => void | Promise<void>;

/**
 * Byte counts reported while a download is running
 */
export interface DownloadProgress {
  url: string;
  /** Bytes written to the target file so far */
  downloaded: number;
  /** Expected size, when the server announced one */
  total?: number;
  /** 1-based attempt number */
  attempt: number;
}
