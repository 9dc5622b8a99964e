/**
 * Default configuration values for downloads
 */

/** Number of transfer attempts before a download is marked as failed */
export const DEFAULT_RETRIES = 3;

/** Base delay between attempts in milliseconds, doubled after each attempt */
export const DEFAULT_RETRY_DELAY = 1000;

/** Connection (socket inactivity) timeout in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT = 15_000;

/** Total time allowed for one attempt in milliseconds */
export const DEFAULT_TIMEOUT = 300_000;

/** Redirects followed when `follow` is enabled */
export const DEFAULT_MAX_REDIRECTS = 5;

export const DEFAULT_SFTP_PORT = 22;

/** Sent unless the request carries its own `User-Agent` */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) biocurl/0.1";

/** Bytes of a failed response body written to the log */
export const FAILED_BODY_PREVIEW_BYTES = 5000;

/** Environment variable overriding the cache directory */
export const CACHE_DIR_ENV = "BIOCURL_CACHE_DIR";

/** Environment variable selecting the log level */
export const LOG_LEVEL_ENV = "BIOCURL_LOG_LEVEL";

/** Application name used for platform specific directories */
export const APP_NAME = "biocurl";
