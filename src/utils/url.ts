import { InvalidUrlError } from "./errors";

// Characters never percent-encoded by `quote`.
const ALWAYS_SAFE = /[A-Za-z0-9_.\-~]/;

const URL_PARTS = /^([a-z][a-z0-9+.-]*:\/\/[^/?#]*)([^?#]*)(?:\?([^#]*))?(#.*)?$/i;
const SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;

interface UrlParts {
  /** Host part, without the scheme */
  domain: string;
  /** Last path segment without the query string; may be empty */
  filename: string;
}

function encodeChar(char: string, safe: string, plus: boolean): string {
  if (ALWAYS_SAFE.test(char) || safe.includes(char)) {
    return char;
  }
  if (plus && char === " ") {
    return "+";
  }
  return Array.from(Buffer.from(char, "utf8"))
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, "0")}`)
    .join("");
}

/**
 * Percent-encodes a string, keeping unreserved characters and those in
 * `safe`.
 */
export function quote(value: string, safe = "/"): string {
  return Array.from(value, (char) => encodeChar(char, safe, false)).join("");
}

/**
 * Like {@link quote} but encodes spaces as `+`, as in form bodies and query
 * strings.
 */
export function quotePlus(value: string, safe = ""): string {
  return Array.from(value, (char) => encodeChar(char, safe, true)).join("");
}

function unquoteFully(value: string, plus: boolean): string {
  let current = value;
  for (;;) {
    let next: string;
    try {
      next = decodeURIComponent(plus ? current.replace(/\+/g, " ") : current);
    } catch {
      return current;
    }
    if (next === current) {
      return current;
    }
    current = next;
  }
}

/**
 * Whether a path is already percent-encoded, i.e. decoding and re-encoding it
 * gives back the same string.
 */
export function isQuoted(value: string): boolean {
  const raw = unquoteFully(value, false);
  return quote(raw, "/%") === value || quote(raw) === value;
}

export function isQuotedPlus(value: string): boolean {
  const raw = unquoteFully(value, true);
  return quotePlus(raw, "&=") === value || quotePlus(raw) === value;
}

/**
 * Percent-encodes the path and query of a URL unless they already are.
 * With `force` both are encoded regardless. Strings that do not look like
 * `scheme://host...` are returned untouched.
 */
export function fixUrl(url: string, force = false): string {
  const match = URL_PARTS.exec(url);
  if (!match) {
    return url;
  }
  const [, origin = "", rawPath = "", rawQuery, hash = ""] = match;
  const path = force || !isQuoted(rawPath) ? quote(rawPath, "/%") : rawPath;
  let query = rawQuery;
  if (query !== undefined && (force || !isQuotedPlus(query))) {
    query = quotePlus(query, "&=");
  }
  return `${origin}${path}${query ? `?${query}` : ""}${hash}`;
}

/**
 * Appends query parameters to a URL, form-encoding names and values.
 */
export function appendQuery(url: string, params?: Readonly<Record<string, string>>): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const qs = Object.entries(params)
    .map(([name, value]) => `${quotePlus(name)}=${quotePlus(value)}`)
    .join("&");
  return `${url}${url.includes("?") ? "&" : "?"}${qs}`;
}

export function getScheme(url: string): string | undefined {
  return SCHEME.exec(url)?.[1]?.toLowerCase();
}

/**
 * Splits a URL into the host it is downloaded from and the remote filename
 * used for cache naming and archive sniffing.
 */
export function parseUrlParts(url: string): UrlParts {
  const withoutScheme = url.replace(SCHEME, "");
  const domain = withoutScheme.split("/")[0] ?? "";
  const lastSegment = url.split("/").pop() ?? "";
  const filename = lastSegment.split("?")[0] ?? "";
  return { domain, filename };
}

/**
 * Validates if a string is a valid URL
 * @throws {InvalidUrlError} If the URL is invalid
 */
export function validateUrl(url: string): void {
  try {
    new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, error instanceof Error ? error : undefined);
  }
}

export type { UrlParts };
