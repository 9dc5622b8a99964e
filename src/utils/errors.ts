class CurlError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A single transfer attempt failed below the protocol level (connection
 * reset, timeout, DNS) or with a status the transport could not recover from.
 */
class NetworkError extends CurlError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
    isRetryable = true,
  ) {
    super(message, isRetryable, cause);
  }
}

/**
 * The transfer was abandoned on purpose, e.g. the user chose "cancel" at a
 * credential prompt. Never retried.
 */
class TransferCancelledError extends NetworkError {
  constructor(url: string, reason: string) {
    super(`Transfer of ${url} cancelled: ${reason}`, 501, undefined, false);
  }
}

class InvalidUrlError extends CurlError {
  constructor(url: string, cause?: Error) {
    super(`Invalid URL: ${url}`, false, cause);
  }
}

class InvalidOptionsError extends CurlError {
  constructor(public readonly issues: string[]) {
    super(`Invalid download options: ${issues.join("; ")}`, false);
  }
}

/**
 * An archive could not be read. Raised rather than reported, since there is
 * no usable fallback for a corrupt container.
 */
class ArchiveError extends CurlError {
  constructor(
    public readonly path: string,
    message: string,
    cause?: Error,
  ) {
    super(`Failed to extract ${path}: ${message}`, false, cause);
  }
}

class CurlStateError extends CurlError {}

/**
 * Login details for a gated resource are missing.
 */
class MissingCredentialsError extends CurlError {
  constructor(
    public readonly resource: string,
    public readonly settingsKey: string,
    public readonly secretsPath?: string,
  ) {
    super(
      `No credentials available for ${resource}. Provide them with the \`${settingsKey}\` option${
        secretsPath ? ` or in the secrets file \`${secretsPath}\` (first line user, second line password)` : ""
      }.`,
      false,
    );
  }
}

/**
 * Normalizes anything thrown into an `Error` suitable for a `cause` slot.
 */
function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export {
  CurlError,
  NetworkError,
  TransferCancelledError,
  InvalidUrlError,
  InvalidOptionsError,
  ArchiveError,
  CurlStateError,
  MissingCredentialsError,
  toError,
};
